export { createAnthropicClient } from "./client.js";
export {
  createSummarizer,
  buildSummaryRequest,
  truncateText,
  isTransientError,
  toSummarizeError,
  SUMMARY_SYSTEM_PROMPT,
} from "./summarize.js";
export type {
  Summarizer,
  SummarizerOptions,
  SummarizeInput,
} from "./summarize.js";
