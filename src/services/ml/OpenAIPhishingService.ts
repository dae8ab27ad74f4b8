import OpenAI from 'openai';
import { AiAnalysis, AiOutcome, ScorerConfig, UsageStats } from '../../types/models';
import { validateAiReply, clampScore } from '../../models/validation';
import {
  AiAnalysisError,
  IncompleteResponseError,
  MalformedResponseError,
  TransportError
} from '../../models/errors';
import { createOpenAIClient } from '../../config/openai';

export const SYSTEM_PROMPT = 'You are a cybersecurity expert. Provide analysis in valid JSON format only.';

/**
 * Service for asking an OpenAI chat model to assess an email for phishing
 */
export class OpenAIPhishingService {
  private openai: OpenAI;
  private model: string;

  constructor(config: ScorerConfig, client?: OpenAI) {
    this.openai = client ?? createOpenAIClient(config);
    this.model = config.model;
  }

  /**
   * Check if OpenAI service is available
   */
  async isAvailable(): Promise<boolean> {
    try {
      await this.openai.models.list();
      return true;
    } catch (error) {
      console.error('OpenAI service unavailable:', error);
      return false;
    }
  }

  /**
   * Assess an email. Transport and reply failures come back as a failed
   * outcome carrying the reason instead of being thrown.
   */
  async assess(content: string): Promise<AiOutcome> {
    try {
      const reply = await this.requestAnalysis(content);
      return { ok: true, analysis: this.parseAnalysisResponse(reply) };
    } catch (error) {
      if (error instanceof AiAnalysisError) {
        console.error(`[PhishingAI] ${error.reason}: ${error.message}`);
        return { ok: false, reason: error.reason, message: error.message };
      }
      throw error;
    }
  }

  /**
   * Build the analysis prompt for OpenAI
   */
  buildAnalysisPrompt(content: string): string {
    return `Analyze this email for phishing attempts. Provide analysis in the following JSON format:
{
  "risk_score": (float between 0-1),
  "threat_indicators": [list of specific suspicious elements found],
  "reasoning": [list of detailed explanations],
  "confidence": (float between 0-1),
  "recommended_actions": [list of recommended user actions]
}

Consider the following in your analysis:
1. Linguistic patterns and urgency
2. Technical indicators (links, headers)
3. Social engineering tactics
4. Credential harvesting attempts

Email content:
${content}`;
  }

  private async requestAnalysis(content: string): Promise<string | null> {
    try {
      const response = await this.openai.chat.completions.create({
        model: this.model,
        messages: [
          {
            role: 'system',
            content: SYSTEM_PROMPT
          },
          {
            role: 'user',
            content: this.buildAnalysisPrompt(content)
          }
        ]
      });

      return response.choices[0]?.message.content ?? null;
    } catch (error) {
      throw new TransportError(
        `OpenAI request failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
        { cause: error }
      );
    }
  }

  /**
   * Parse and validate the model's reply, then derive the adjusted score
   */
  parseAnalysisResponse(content: string | null): AiAnalysis {
    if (!content) {
      throw new MalformedResponseError('Empty response from OpenAI');
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new MalformedResponseError('Invalid JSON response from OpenAI', { cause: error });
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new MalformedResponseError('OpenAI response is not a JSON object');
    }

    const { error, value } = validateAiReply(parsed);
    if (error || !value) {
      throw new IncompleteResponseError(
        `Missing required fields in AI response: ${error ? error.message : 'no value'}`
      );
    }

    const riskScore = clampScore(value.risk_score);

    return {
      risk_score: riskScore,
      threat_indicators: value.threat_indicators,
      reasoning: value.reasoning,
      confidence: value.confidence,
      ...(value.recommended_actions ? { recommended_actions: value.recommended_actions } : {}),
      adjusted_risk_score: riskScore * value.confidence,
      timestamp: new Date().toISOString(),
      model_version: this.model
    };
  }

  getModel(): string {
    return this.model;
  }

  /**
   * Get usage statistics (for monitoring)
   */
  async getUsageStats(): Promise<UsageStats> {
    const isAvailable = await this.isAvailable();

    return {
      model: this.model,
      isAvailable,
      lastChecked: new Date()
    };
  }
}
