// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0

/**
 * Length of the longest common subsequence of `a` and `b`, compared by code point.
 */
export function longestCommonSubsequence(a: string, b: string): number {
  const x = Array.from(a);
  const y = Array.from(b);
  if (x.length === 0 || y.length === 0) {
    return 0;
  }

  let prev = new Array<number>(y.length + 1).fill(0);
  let curr = new Array<number>(y.length + 1).fill(0);

  for (const cx of x) {
    for (let j = 1; j <= y.length; j++) {
      curr[j] =
        cx === y[j - 1]
          ? (prev[j - 1] ?? 0) + 1
          : Math.max(prev[j] ?? 0, curr[j - 1] ?? 0);
    }
    [prev, curr] = [curr, prev];
  }

  return prev[y.length] ?? 0;
}

/**
 * Insert/delete edit similarity in [0, 1]: `1 - indelDistance / (|a| + |b|)`, which equals
 * `2 * lcs / (|a| + |b|)`. A substitution costs two edits, so single-letter swaps in short words
 * ("stop" / "shop") stay below the default threshold while dropped or doubled letters
 * ("yeh" / "yeah", "stopp" / "stop") stay above it.
 */
export function similarity(a: string, b: string): number {
  const total = Array.from(a).length + Array.from(b).length;
  if (total === 0) {
    return 1;
  }
  return (2 * longestCommonSubsequence(a, b)) / total;
}
