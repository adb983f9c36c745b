/**
 * Counts `\n` terminators in delimited text. Approximate on purpose: it counts terminators,
 * not validated rows, and never allocates.
 */
export const countLineTerminators = (text: string): number => {
  let count = 0;
  for (let index = text.indexOf("\n"); index !== -1; index = text.indexOf("\n", index + 1)) {
    count++;
  }
  return count;
};

/** Row counts read from file metadata may be `bigint`; the selector only compares magnitudes. */
export const rowCountToProxy = (rows: number | bigint): number => {
  if (typeof rows === "number") return rows;
  return rows > BigInt(Number.MAX_SAFE_INTEGER) ? Number.MAX_SAFE_INTEGER : Number(rows);
};
