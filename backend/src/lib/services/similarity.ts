const WINKLER_PREFIX_SCALE = 0.1;
const WINKLER_MAX_PREFIX = 4;
const WINKLER_BOOST_THRESHOLD = 0.7;

/**
 * Jaro similarity in [0, 1]. Inputs are put in a fixed order first so the
 * greedy character matching cannot make the score depend on argument order.
 */
export function jaro(a: string, b: string): number {
  if (a === b) return 1;
  const [s1, s2] = a <= b ? [a, b] : [b, a];

  const len1 = s1.length;
  const len2 = s2.length;
  if (len1 === 0 || len2 === 0) return 0;

  const window = Math.max(0, Math.floor(Math.max(len1, len2) / 2) - 1);
  const matched1 = new Array<boolean>(len1).fill(false);
  const matched2 = new Array<boolean>(len2).fill(false);
  let matches = 0;

  for (let i = 0; i < len1; i++) {
    const start = Math.max(0, i - window);
    const end = Math.min(i + window + 1, len2);
    for (let j = start; j < end; j++) {
      if (matched2[j] || s1[i] !== s2[j]) continue;
      matched1[i] = true;
      matched2[j] = true;
      matches++;
      break;
    }
  }

  if (matches === 0) return 0;

  let halfTranspositions = 0;
  let k = 0;
  for (let i = 0; i < len1; i++) {
    if (!matched1[i]) continue;
    while (!matched2[k]) k++;
    if (s1[i] !== s2[k]) halfTranspositions++;
    k++;
  }

  const transpositions = halfTranspositions / 2;
  return (matches / len1 + matches / len2 + (matches - transpositions) / matches) / 3;
}

function commonPrefixLength(a: string, b: string, max: number): number {
  const limit = Math.min(a.length, b.length, max);
  let n = 0;
  while (n < limit && a[n] === b[n]) n++;
  return n;
}

/**
 * Jaro-Winkler similarity: Jaro plus a bonus for a shared prefix of up to
 * four characters, applied once the Jaro score clears 0.7.
 */
export function jaroWinkler(a: string, b: string): number {
  const j = jaro(a, b);
  if (j < WINKLER_BOOST_THRESHOLD) return j;
  const prefix = commonPrefixLength(a, b, WINKLER_MAX_PREFIX);
  return Math.min(1, j + prefix * WINKLER_PREFIX_SCALE * (1 - j));
}
