import { ScorerConfig } from '../types/models';

export const testConfig: ScorerConfig = {
  openaiApiKey: 'test-api-key',
  model: 'gpt-4',
  weights: { rule: 0.3, ai: 0.7 },
  transport: {
    timeoutMs: 60000,
    maxRetries: 0
  },
  batchDelayMs: 0
};

/**
 * Wrap a reply body the way the chat completions API returns it
 */
export function chatReply(content: string | null) {
  return {
    choices: [{
      message: {
        role: 'assistant',
        content
      }
    }]
  };
}
