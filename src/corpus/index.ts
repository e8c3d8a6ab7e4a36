export type { Corpus, CorpusSource } from "./types.js";
export type { CorpusFile } from "./json-corpus.js";
export { JsonCorpusSource, InMemoryCorpusSource, CorpusFileSchema, toCorpus } from "./json-corpus.js";
