/**
 * Word-set overlap used for long-term ranking and for spotting repeat mentions
 * of short-term entries.
 */

/** Lowercased words of length >= 2, punctuation stripped */
export function tokenize(text: string): Set<string> {
  return new Set(
    text
      .toLowerCase()
      .split(/[^\p{L}\p{N}']+/u)
      .map(w => w.replace(/^'+|'+$/g, ''))
      .filter(w => w.length >= 2)
  )
}

/** Overlap ratio against the larger word set, 0..1 */
export function contentSimilarity(a: string, b: string): number {
  const wordsA = tokenize(a)
  const wordsB = tokenize(b)
  if (wordsA.size === 0 || wordsB.size === 0) return 0
  let overlap = 0
  for (const w of wordsA) {
    if (wordsB.has(w)) overlap++
  }
  return overlap / Math.max(wordsA.size, wordsB.size)
}

/** Share of the query's words found in the text, 0..1 */
export function queryCoverage(query: string, text: string): number {
  const queryWords = tokenize(query)
  if (queryWords.size === 0) return 0
  const textWords = tokenize(text)
  let hits = 0
  for (const w of queryWords) {
    if (textWords.has(w)) hits++
  }
  return hits / queryWords.size
}
