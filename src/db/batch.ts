// Postgres caps a statement at 65,535 bind parameters. Widest insert is a match
// row at 14 columns, so 1,000 rows stays well below it.
export const INSERT_BATCH_SIZE = 1000;

export function chunkArray<T>(
  array: readonly T[],
  size: number = INSERT_BATCH_SIZE,
): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Batch size must be a positive integer (got ${size})`);
  }
  const chunks: T[][] = [];
  for (let i = 0; i < array.length; i += size) {
    chunks.push(array.slice(i, i + size));
  }
  return chunks;
}
