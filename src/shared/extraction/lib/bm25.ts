export interface Bm25Options {
  k1?: number;
  b?: number;
  // Floor for negative idf values, as a fraction of the mean idf.
  epsilon?: number;
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().split(/\s+/).filter(Boolean);
}

/**
 * Okapi BM25 scores of `query` against each document. Terms that occur in
 * more than half of the documents get a small positive idf instead of a
 * negative one.
 */
export function bm25Scores(
  documents: string[][],
  query: string[],
  { k1 = 1.5, b = 0.75, epsilon = 0.25 }: Bm25Options = {},
): number[] {
  const corpusSize = documents.length;
  if (corpusSize === 0) return [];

  const avgLength =
    documents.reduce((sum, doc) => sum + doc.length, 0) / corpusSize || 1;

  const termFrequencies = documents.map((doc) => {
    const counts = new Map<string, number>();
    for (const term of doc) counts.set(term, (counts.get(term) ?? 0) + 1);
    return counts;
  });

  const documentFrequency = new Map<string, number>();
  for (const counts of termFrequencies) {
    for (const term of counts.keys()) {
      documentFrequency.set(term, (documentFrequency.get(term) ?? 0) + 1);
    }
  }

  const idf = new Map<string, number>();
  let idfSum = 0;
  const negative: string[] = [];
  for (const [term, frequency] of documentFrequency) {
    const value =
      Math.log(corpusSize - frequency + 0.5) - Math.log(frequency + 0.5);
    idf.set(term, value);
    idfSum += value;
    if (value < 0) negative.push(term);
  }
  const floor = (epsilon * idfSum) / documentFrequency.size;
  for (const term of negative) idf.set(term, floor);

  return termFrequencies.map((counts, index) => {
    const length = documents[index].length;
    let score = 0;
    for (const term of query) {
      const frequency = counts.get(term) ?? 0;
      if (frequency === 0) continue;
      score +=
        ((idf.get(term) ?? 0) * (frequency * (k1 + 1))) /
        (frequency + k1 * (1 - b + (b * length) / avgLength));
    }
    return score;
  });
}
