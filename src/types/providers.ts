export type ProviderId = 'smhi';
