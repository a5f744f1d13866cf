/**
 * Length of the longest common subsequence of two strings, by UTF-16 unit.
 */
export function longestCommonSubsequence(a: string, b: string): number {
  const n = b.length;
  const dp = new Array<number>(n + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    let prev = 0;
    for (let j = 1; j <= n; j++) {
      const temp = dp[j] ?? 0;
      if (a[i - 1] === b[j - 1]) {
        dp[j] = prev + 1;
      } else {
        dp[j] = Math.max(temp, dp[j - 1] ?? 0);
      }
      prev = temp;
    }
  }

  return dp[n] ?? 0;
}

/**
 * Normalized insertion/deletion similarity on a 0-100 scale, unrounded:
 * `100 * (1 - indel / (|a| + |b|))` with `indel = |a| + |b| - 2 * lcs`.
 * Case-sensitive; two empty strings are identical (100).
 */
export function fuzzyRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 100;
  return (200 * longestCommonSubsequence(a, b)) / total;
}
