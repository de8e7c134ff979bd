function levenshtein(a: string, b: string): number {
  const prev = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    let diag = prev[0];
    prev[0] = i;
    for (let j = 1; j <= b.length; j++) {
      const above = prev[j];
      prev[j] = Math.min(prev[j] + 1, prev[j - 1] + 1, diag + (a[i - 1] === b[j - 1] ? 0 : 1));
      diag = above;
    }
  }
  return prev[b.length];
}

/**
 * Closest known names to `input`: substring matches first, then by edit
 * distance within a third of the longer name.
 */
export function suggest(input: string, known: readonly string[], limit = 3): string[] {
  const needle = input.trim().toLowerCase();
  if (!needle) return [];

  const scored = known
    .map((name) => {
      const candidate = name.toLowerCase();
      const contains = candidate.includes(needle) || needle.includes(candidate);
      const distance = levenshtein(needle, candidate);
      return { name, score: contains ? 0 : distance, distance, max: Math.max(needle.length, candidate.length) };
    })
    .filter((s) => s.score === 0 || s.distance <= Math.ceil(s.max / 3))
    .sort((a, b) => a.score - b.score || a.distance - b.distance || a.name.localeCompare(b.name));

  return scored.slice(0, limit).map((s) => s.name);
}
