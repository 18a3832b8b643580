// ---------------------------------------------------------------------------
// Similarity Scorer: TF-IDF vectors over a two-document corpus, cosine similarity
// ---------------------------------------------------------------------------

export interface SimilarityOptions {
  stopwords?: ReadonlySet<string>;
  /** Vocabulary cap, most frequent terms across both documents first. */
  maxFeatures?: number;
}

const DEFAULT_MAX_FEATURES = 500;

export function tokenizeForTfidf(text: string, stopwords: ReadonlySet<string> = new Set()): string[] {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9+#\s]/g, ' ')
    .split(/\s+/)
    .filter((t) => t.length >= 2 && !stopwords.has(t));
}

function countTerms(tokens: string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const token of tokens) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  return counts;
}

function buildVocabulary(docs: Map<string, number>[], maxFeatures: number): string[] {
  const totals = new Map<string, number>();
  for (const doc of docs) {
    for (const [term, count] of doc) {
      totals.set(term, (totals.get(term) ?? 0) + count);
    }
  }
  return [...totals.entries()]
    .sort((a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0))
    .slice(0, maxFeatures)
    .map(([term]) => term);
}

// Smoothed IDF: ln((1 + n) / (1 + df)) + 1
function inverseDocumentFrequency(term: string, docs: Map<string, number>[]): number {
  const df = docs.filter((doc) => doc.has(term)).length;
  return Math.log((1 + docs.length) / (1 + df)) + 1;
}

export function cosineSimilarity(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;

  const len = Math.min(a.length, b.length);
  for (let i = 0; i < len; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Scores how closely two documents share vocabulary, 0-100.
 * Linear scaling of the cosine; 0 whenever either side has no usable terms.
 */
export function scoreSimilarity(resumeText: string, jdText: string, options: SimilarityOptions = {}): number {
  const stopwords = options.stopwords ?? new Set<string>();
  const docs = [
    countTerms(tokenizeForTfidf(resumeText, stopwords)),
    countTerms(tokenizeForTfidf(jdText, stopwords)),
  ];
  if (docs[0].size === 0 || docs[1].size === 0) return 0;

  const vocabulary = buildVocabulary(docs, options.maxFeatures ?? DEFAULT_MAX_FEATURES);
  const idf = vocabulary.map((term) => inverseDocumentFrequency(term, docs));
  const [resumeVector, jdVector] = docs.map((doc) =>
    vocabulary.map((term, i) => (doc.get(term) ?? 0) * idf[i])
  );

  const cosine = Math.min(1, Math.max(0, cosineSimilarity(resumeVector, jdVector)));
  return Math.round(cosine * 10000) / 100;
}
