/** Converts a currency amount to an integer number of cents. */
export const toCents = (n: number): number => Math.round(n * 100)

/** Converts an integer number of cents back to a currency amount. */
export const fromCents = (n: number): number => n / 100
