import Joi from 'joi';
import { AiReply } from '../types/models';

/**
 * Validation schemas and functions for model replies and API requests
 */

export const MAX_BATCH_EMAILS = 20;

// Extra keys in the model's reply are tolerated; numeric strings are converted
export const aiReplySchema = Joi.object<AiReply>({
  risk_score: Joi.number().unsafe().required(),
  threat_indicators: Joi.array().items(Joi.string()).required(),
  reasoning: Joi.array().items(Joi.string()).required(),
  confidence: Joi.number().unsafe().required(),
  recommended_actions: Joi.array().items(Joi.string()).optional()
}).unknown(true);

export interface AnalyzeRequest {
  content: string;
}

export interface BatchAnalyzeRequest {
  emails: string[];
  batchSize?: number;
}

export const analyzeRequestSchema = Joi.object<AnalyzeRequest>({
  content: Joi.string().allow('').required()
});

export const batchAnalyzeRequestSchema = Joi.object<BatchAnalyzeRequest>({
  emails: Joi.array().items(Joi.string().allow('')).min(1).max(MAX_BATCH_EMAILS).required(),
  batchSize: Joi.number().integer().min(1).max(MAX_BATCH_EMAILS).optional()
});

// Validation functions
export function validateAiReply(reply: unknown): { error?: Joi.ValidationError; value?: AiReply } {
  return aiReplySchema.validate(reply, { abortEarly: false });
}

export function validateAnalyzeRequest(body: unknown): { error?: Joi.ValidationError; value?: AnalyzeRequest } {
  return analyzeRequestSchema.validate(body, { abortEarly: false });
}

export function validateBatchAnalyzeRequest(body: unknown): { error?: Joi.ValidationError; value?: BatchAnalyzeRequest } {
  return batchAnalyzeRequestSchema.validate(body, { abortEarly: false });
}

export function clampScore(score: number): number {
  return Math.max(0, Math.min(1, score));
}
