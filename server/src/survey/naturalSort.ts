const DIGIT_RUN = /(\d+)/;

function compareDigitRuns(a: string, b: string): number {
  const x = a.replace(/^0+(?=\d)/, '');
  const y = b.replace(/^0+(?=\d)/, '');
  if (x.length !== y.length) return x.length - y.length;
  return x < y ? -1 : x > y ? 1 : 0;
}

/**
 * Orders embedded digit runs by value ("HD 2" before "HD 10") and everything
 * else by code point, so "KOI-13 b" sorts before "Kepler-7 b".
 */
export function naturalCompare(a: string, b: string): number {
  // split() with a capture group alternates text (even) and digits (odd).
  const left = a.split(DIGIT_RUN);
  const right = b.split(DIGIT_RUN);
  const n = Math.min(left.length, right.length);

  for (let i = 0; i < n; i++) {
    const order =
      i % 2 === 1
        ? compareDigitRuns(left[i], right[i])
        : left[i] < right[i]
          ? -1
          : left[i] > right[i]
            ? 1
            : 0;
    if (order !== 0) return order;
  }
  return left.length - right.length;
}

export function naturalSortBy<T>(items: readonly T[], key: (item: T) => string): T[] {
  return [...items].sort((a, b) => naturalCompare(key(a), key(b)));
}
