/**
 * Labeled train/test split. Labels are ids indexing `labelNames`.
 */
export interface Corpus {
  trainTexts: string[];
  trainLabels: number[];
  testTexts: string[];
  testLabels: number[];
  labelNames: string[];
}

/**
 * Anything that can supply the original labeled corpus
 */
export interface CorpusSource {
  load(): Promise<Corpus>;
}
