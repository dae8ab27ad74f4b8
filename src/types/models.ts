/**
 * Core data models for the phishing risk scorer
 */

/**
 * Category name mapped to the trigger phrases that count towards the rule-based score
 */
export type IndicatorTable = Readonly<Record<string, readonly string[]>>;

export interface AiAnalysis {
  risk_score: number; // Clamped to [0, 1]
  threat_indicators: string[];
  reasoning: string[];
  confidence: number;
  recommended_actions?: string[];
  adjusted_risk_score: number; // risk_score * confidence
  timestamp: string;
  model_version: string;
}

export interface FallbackAnalysis {
  risk_score: number;
  threat_indicators: string[];
  reasoning: string[];
  confidence: number;
  timestamp: string;
}

export interface DetailedThreats {
  indicators: string[];
  reasoning: string[];
  actions: string[];
}

export interface AiAnalysisResult {
  risk_score: number; // Adjusted risk score, or 0.5 on fallback
  analysis: AiAnalysis | FallbackAnalysis;
  detailed_threats: DetailedThreats;
}

export interface CombinedResult {
  rule_based_score: number;
  ai_analysis: AiAnalysisResult;
  combined_risk: number;
}

export type AiFailureReason = 'transport_error' | 'malformed_response' | 'incomplete_response';

export type AiOutcome =
  | { ok: true; analysis: AiAnalysis }
  | { ok: false; reason: AiFailureReason; message: string };

/**
 * Shape of the JSON object the model is asked to return
 */
export interface AiReply {
  risk_score: number;
  threat_indicators: string[];
  reasoning: string[];
  confidence: number;
  recommended_actions?: string[];
}

export interface ScoreWeights {
  rule: number;
  ai: number;
}

export interface TransportConfig {
  httpProxy?: string;
  httpsProxy?: string;
  timeoutMs: number;
  maxRetries: number;
}

export interface ScorerConfig {
  openaiApiKey: string;
  model: string;
  weights: ScoreWeights;
  transport: TransportConfig;
  batchDelayMs: number;
}

export interface UsageStats {
  model: string;
  isAvailable: boolean;
  lastChecked: Date;
}
