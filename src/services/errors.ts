export class ForecastError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * The forecast endpoint could not be read. `status` is null when no
 * response arrived at all (network failure, timeout).
 */
export class ForecastFetchError extends ForecastError {
    readonly status: number | null;
    readonly url: string;

    constructor(url: string, status: number | null, options?: { cause?: unknown }) {
        super(
            status === null
                ? `Failed to access SMHI API - network error (${url})`
                : `Failed to access SMHI API - Code: ${status}`,
            options
        );
        this.status = status;
        this.url = url;
    }
}

export class MalformedForecastError extends ForecastError {
    readonly validTime?: string;

    constructor(message: string, validTime?: string) {
        super(validTime ? `${message} (validTime ${validTime})` : message);
        this.validTime = validTime;
    }
}
