/** Platform fee on every wager, in basis points (2.5%). */
export const HOUSE_EDGE_BPS = 250n;

/** Pegged units per native unit. */
export const RATIO = 100n;

export const BASIS_POINTS_DENOM = 10_000n;
