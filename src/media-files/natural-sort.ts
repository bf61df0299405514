type SortChunk = string | number;

/**
 * Splits a name into alternating text and digit runs ("Track 10.mp3" -> ["track ", 10, ".mp3"]).
 * Text runs are lowercased so ordering ignores case.
 */
export function naturalSortKey(name: string): SortChunk[] {
  return name
    .split(/(\d+)/)
    .map((chunk) => (/^\d+$/.test(chunk) ? Number(chunk) : chunk.toLowerCase()));
}

/**
 * Compares two names so that embedded numbers sort numerically
 */
export function naturalCompare(a: string, b: string): number {
  const left = naturalSortKey(a);
  const right = naturalSortKey(b);

  for (let i = 0; i < Math.min(left.length, right.length); i++) {
    const x = left[i];
    const y = right[i];
    if (x === y) {
      continue;
    }
    // split() keeps text runs at even indexes and digit runs at odd ones
    if (typeof x === "number" && typeof y === "number") {
      return x - y;
    }
    return String(x) < String(y) ? -1 : 1;
  }

  return left.length - right.length;
}
