import Anthropic from "@anthropic-ai/sdk";

export function createAnthropicClient(options: {
  apiKey: string;
  baseURL?: string;
  timeoutMs?: number;
}): Anthropic {
  // Retries are owned by the summarizer so the policy stays exact.
  return new Anthropic({
    apiKey: options.apiKey,
    baseURL: options.baseURL,
    timeout: options.timeoutMs,
    maxRetries: 0,
  });
}
