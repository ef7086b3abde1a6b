/** `matrix[i][j]`: buyer `i`'s value for product `j`. */
export type ValuationMatrix = readonly (readonly number[])[];

/** One price per product, index-aligned with matrix columns. */
export type PriceVector = readonly number[];

/** Produces floats uniformly distributed in `[0, 1)`. */
export type RandomSource = () => number;
