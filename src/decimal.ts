import { Decimal } from 'decimal.js';

// Ledger amounts carry two fractional digits and prices up to six; 29
// significant digits keeps products and FX conversions exact at that scale.
Decimal.set({ precision: 29, rounding: Decimal.ROUND_HALF_UP });

export { Decimal };
