// Decimals past the rounding digit used to read a double's exact value.
const EXACT_DIGITS = 25;

/**
 * Rounds to `digits` decimals, sending exact ties to the even neighbour
 * (12.5 -> 12, 37.5 -> 38). Ties are judged on the double's exact binary
 * value: 0.15 is stored as 0.1499999..., so it rounds to 0.1, and 2.675
 * rounds to 2.67.
 */
export function roundHalfEven(value: number, digits = 0): number {
    if (!Number.isFinite(value) || Math.abs(value) >= 1e21) return value;

    const [whole, fraction] = Math.abs(value).toFixed(digits + EXACT_DIGITS).split('.');
    const rest = fraction.slice(digits);
    const half = '5'.padEnd(rest.length, '0');

    let scaled = BigInt(`${whole}${fraction.slice(0, digits)}`);
    if (rest > half || (rest === half && scaled % 2n === 1n)) {
        scaled += 1n;
    }

    const result = (Math.sign(value) * Number(scaled)) / Math.pow(10, digits);
    // Avoid handing out -0 for small negative inputs.
    return result === 0 ? 0 : result;
}

export const MAX_OCTAS = 8;

// Out-of-range octas (SMHI uses 9 for "sky obscured") count as overcast.
export function octasToCloudiness(octas: number): number {
    if (octas >= 0 && octas <= MAX_OCTAS) {
        return roundHalfEven((100 * octas) / MAX_OCTAS);
    }
    return 100;
}
