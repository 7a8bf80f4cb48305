/**
 * Edit distance helpers shared by the similarity engine
 */

/**
 * Calculate the Levenshtein distance between two strings
 *
 * Works on Unicode code points, so a character outside the BMP counts as one
 * edit. Insertion, deletion and substitution all cost 1.
 */
export function levenshteinDistance(str1: string, str2: string): number {
  const a = Array.from(str1);
  const b = Array.from(str2);

  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  // Two rolling rows instead of the full matrix
  let previous: number[] = [];
  for (let j = 0; j <= b.length; j++) {
    previous.push(j);
  }

  for (let i = 1; i <= a.length; i++) {
    const current: number[] = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current.push(Math.min(
        previous[j] + 1,        // deletion
        current[j - 1] + 1,     // insertion
        previous[j - 1] + cost  // substitution
      ));
    }
    previous = current;
  }

  return previous[b.length];
}

/**
 * Similarity score in [0, 1]: 1 - distance / longest length
 *
 * Two empty strings are identical and score 1.
 */
export function similarityScore(str1: string, str2: string): number {
  const maxLength = Math.max(Array.from(str1).length, Array.from(str2).length);
  if (maxLength === 0) {
    return 1;
  }
  return 1 - levenshteinDistance(str1, str2) / maxLength;
}
