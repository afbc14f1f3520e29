const DIGIT_RUN = /(\d+)/;

function compareChunks(a: string, b: string): number {
  const aNumeric = /^\d+$/.test(a);
  const bNumeric = /^\d+$/.test(b);
  if (aNumeric && bNumeric) {
    const diff = Number(a) - Number(b);
    if (diff !== 0) return diff;
    // "01" and "1" are equal as numbers; the shorter spelling goes first.
    return a.length - b.length;
  }
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Natural order: digit runs compare by value, so `run-2` precedes `run-10`. */
export function compareNatural(a: string, b: string): number {
  const aChunks = a.split(DIGIT_RUN);
  const bChunks = b.split(DIGIT_RUN);
  const length = Math.min(aChunks.length, bChunks.length);
  for (let index = 0; index < length; index += 1) {
    const result = compareChunks(aChunks[index], bChunks[index]);
    if (result !== 0) return result;
  }
  return aChunks.length - bChunks.length;
}

/** Compares `/`-separated paths one segment at a time in natural order. */
export function comparePathsNatural(a: readonly string[], b: readonly string[]): number {
  const length = Math.min(a.length, b.length);
  for (let index = 0; index < length; index += 1) {
    const result = compareNatural(a[index], b[index]);
    if (result !== 0) return result;
  }
  return a.length - b.length;
}
