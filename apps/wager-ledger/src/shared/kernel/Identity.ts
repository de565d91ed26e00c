/** Authenticated caller or account holder. */
export type Identity = string;
