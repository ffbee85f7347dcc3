/**
 * Character-level edit distance between model names.
 */

/**
 * Levenshtein distance: minimum number of single-character insertions,
 * deletions and substitutions turning one string into the other.
 *
 * Comparison is case-sensitive; callers pass canonical uppercase keys.
 */
export function levenshteinDistance(a: string, b: string): number {
  if (a === b) return 0

  const m = a.length
  const n = b.length

  if (m === 0) return n
  if (n === 0) return m

  // Dynamic programming matrix
  const dp: number[][] = Array.from({ length: m + 1 }, () => new Array<number>(n + 1).fill(0))

  for (let i = 0; i <= m; i++) dp[i][0] = i
  for (let j = 0; j <= n; j++) dp[0][j] = j

  for (let i = 1; i <= m; i++) {
    for (let j = 1; j <= n; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1
      dp[i][j] = Math.min(
        dp[i - 1][j] + 1, // deletion
        dp[i][j - 1] + 1, // insertion
        dp[i - 1][j - 1] + cost // substitution
      )
    }
  }

  return dp[m][n]
}

/**
 * Number of characters the two strings have in common, counted with
 * multiplicity and regardless of position ("1018" and "1080" share 3).
 */
export function sharedCharacterCount(a: string, b: string): number {
  const remaining = new Map<string, number>()
  for (const char of b) {
    remaining.set(char, (remaining.get(char) ?? 0) + 1)
  }

  let shared = 0
  for (const char of a) {
    const count = remaining.get(char) ?? 0
    if (count > 0) {
      shared += 1
      remaining.set(char, count - 1)
    }
  }
  return shared
}
