import Joi from 'joi';
import { ScorerConfig } from '../types/models';
import { ConfigMissingError } from '../models/errors';

export const DEFAULT_MODEL = 'gpt-4';
export const DEFAULT_WEIGHTS = { rule: 0.3, ai: 0.7 } as const;

interface ScorerEnv {
  OPENAI_API_KEY: string;
  OPENAI_MODEL: string;
  HTTP_PROXY?: string;
  HTTPS_PROXY?: string;
  OPENAI_TIMEOUT_MS: number;
  OPENAI_MAX_RETRIES: number;
  RULE_WEIGHT: number;
  AI_WEIGHT: number;
  BATCH_DELAY_MS: number;
}

// Empty strings count as unset so a blank line in .env falls back to the default
const scorerEnvSchema = Joi.object<ScorerEnv>({
  OPENAI_API_KEY: Joi.string().trim().required(),
  OPENAI_MODEL: Joi.string().trim().empty('').default(DEFAULT_MODEL),
  HTTP_PROXY: Joi.string().uri().empty('').optional(),
  HTTPS_PROXY: Joi.string().uri().empty('').optional(),
  OPENAI_TIMEOUT_MS: Joi.number().integer().min(1).empty('').default(60000),
  OPENAI_MAX_RETRIES: Joi.number().integer().min(0).empty('').default(0),
  RULE_WEIGHT: Joi.number().min(0).max(1).empty('').default(DEFAULT_WEIGHTS.rule),
  AI_WEIGHT: Joi.number().min(0).max(1).empty('').default(DEFAULT_WEIGHTS.ai),
  BATCH_DELAY_MS: Joi.number().integer().min(0).empty('').default(1000)
}).unknown(true);

/**
 * Build the scorer configuration from environment variables.
 * Throws ConfigMissingError when the API key is absent or a value is invalid.
 */
export function loadScorerConfig(env: NodeJS.ProcessEnv = process.env): ScorerConfig {
  const { error, value } = scorerEnvSchema.validate(env, { abortEarly: false });
  if (error || !value) {
    throw new ConfigMissingError(`Invalid scorer configuration: ${error ? error.message : 'no value'}`);
  }

  // Weights above 1 in total would push combined_risk out of [0, 1]
  if (value.RULE_WEIGHT + value.AI_WEIGHT > 1) {
    throw new ConfigMissingError('Invalid scorer configuration: RULE_WEIGHT + AI_WEIGHT must not exceed 1');
  }

  return {
    openaiApiKey: value.OPENAI_API_KEY,
    model: value.OPENAI_MODEL,
    weights: {
      rule: value.RULE_WEIGHT,
      ai: value.AI_WEIGHT
    },
    transport: {
      httpProxy: value.HTTP_PROXY,
      httpsProxy: value.HTTPS_PROXY,
      timeoutMs: value.OPENAI_TIMEOUT_MS,
      maxRetries: value.OPENAI_MAX_RETRIES
    },
    batchDelayMs: value.BATCH_DELAY_MS
  };
}

/**
 * Mask a secret for log output, keeping only its first characters
 */
export function maskSecret(secret: string, visible: number = 5): string {
  return `${secret.slice(0, visible)}...`;
}
