export type PipelineConfig = {
  /** Sentences of the answer shown before/after the sentence being processed. */
  contextBefore: number;
  contextAfter: number;

  stageConcurrency: number;
  maxConcurrentClaims: number;
  searchConcurrency: number;

  llmTimeoutMs: number;
  searchTimeoutMs: number;

  /** Parallel attempts per item for selection/disambiguation/decomposition, and how many must agree. */
  completions: number;
  minSuccesses: number;

  /** Drop sentences the model cannot disambiguate instead of keeping the selected text. */
  dropUnresolvedSentences: boolean;

  maxQueries: number;
  maxEvidence: number;
  /** Extra query/retrieve/evaluate rounds when the verdict is Insufficient Information. */
  maxRetries: number;
};

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  contextBefore: 5,
  contextAfter: 5,
  stageConcurrency: 8,
  maxConcurrentClaims: 5,
  searchConcurrency: 4,
  llmTimeoutMs: 60_000,
  searchTimeoutMs: 15_000,
  completions: 1,
  minSuccesses: 1,
  dropUnresolvedSentences: false,
  maxQueries: 3,
  maxEvidence: 20,
  maxRetries: 3
};
