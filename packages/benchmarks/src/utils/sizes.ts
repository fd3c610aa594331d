/**
 * Common matrix orders for benchmarking
 */

export interface BenchmarkSize {
  name: string;
  order: number;
}

export const MATRIX_SIZES: readonly BenchmarkSize[] = [
  { name: 'tiny', order: 4 },
  { name: 'small', order: 16 },
  { name: 'medium', order: 64 },
  { name: 'large', order: 128 },
];

/** Cubic operations get the smaller end of the range */
export const CUBIC_SIZES: readonly BenchmarkSize[] = MATRIX_SIZES.slice(0, 3);

export function formatSize(size: BenchmarkSize): string {
  const elements = size.order * size.order;
  return `${size.name} ${size.order}x${size.order} (${elements.toLocaleString()} elements)`;
}
