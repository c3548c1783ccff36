import Decimal from 'decimal.js';

// asset symbol -> quantity owned by the pool.
// Equals the sum of unitAmount over the asset's buy records.
export type HoldingsMap = Record<string, Decimal>;
