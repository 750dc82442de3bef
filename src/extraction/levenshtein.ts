/**
 * Levenshtein 편집 거리 (2행 DP)
 */
export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  const al = a.length;
  const bl = b.length;
  if (al === 0) return bl;
  if (bl === 0) return al;

  let prev = Array.from({ length: bl + 1 }, (_, i) => i);
  let curr = new Array<number>(bl + 1).fill(0);

  for (let i = 0; i < al; i++) {
    curr[0] = i + 1;
    const ai = a.charCodeAt(i);
    for (let j = 0; j < bl; j++) {
      const cost = ai === b.charCodeAt(j) ? 0 : 1;
      curr[j + 1] = Math.min(prev[j + 1] + 1, curr[j] + 1, prev[j] + cost);
    }
    [prev, curr] = [curr, prev];
  }
  return prev[bl];
}
