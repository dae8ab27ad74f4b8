import {
  AiAnalysisResult,
  AiOutcome,
  CombinedResult,
  IndicatorTable,
  ScoreWeights,
  ScorerConfig
} from '../../types/models';
import { OpenAIPhishingService } from '../ml/OpenAIPhishingService';
import { RuleBasedAnalyzer } from './RuleBasedAnalyzer';
import { DEFAULT_INDICATORS } from './indicators';

export const FALLBACK_RISK_SCORE = 0.5;
export const DEFAULT_BATCH_SIZE = 5;

export interface RiskScorerOptions {
  indicators?: IndicatorTable;
  aiService?: OpenAIPhishingService;
}

/**
 * Blends the keyword heuristic with the OpenAI assessment into one phishing risk score.
 * A failed AI step degrades to a neutral 0.5 instead of surfacing an error.
 */
export class RiskScorer {
  private ruleAnalyzer: RuleBasedAnalyzer;
  private aiService: OpenAIPhishingService;
  private weights: ScoreWeights;
  private batchDelayMs: number;

  constructor(config: ScorerConfig, options: RiskScorerOptions = {}) {
    this.ruleAnalyzer = new RuleBasedAnalyzer(options.indicators ?? DEFAULT_INDICATORS);
    this.aiService = options.aiService ?? new OpenAIPhishingService(config);
    this.weights = config.weights;
    this.batchDelayMs = config.batchDelayMs;
  }

  /**
   * Analyze an email with both approaches. Never rejects.
   */
  async analyze(content: string): Promise<CombinedResult> {
    const ruleBasedScore = this.lexicalScore(content);
    const aiAnalysis = await this.aiScore(content);

    return {
      rule_based_score: ruleBasedScore,
      ai_analysis: aiAnalysis,
      combined_risk: this.combine(ruleBasedScore, aiAnalysis.risk_score)
    };
  }

  /**
   * Analyze several emails, a batch at a time, keeping input order
   */
  async analyzeBatch(contents: string[], batchSize: number = DEFAULT_BATCH_SIZE): Promise<CombinedResult[]> {
    // Non-finite sizes would make every slice empty
    const size = Number.isFinite(batchSize) ? Math.max(1, Math.floor(batchSize)) : DEFAULT_BATCH_SIZE;
    const results: CombinedResult[] = [];

    // Process emails in batches to avoid rate limits
    for (let i = 0; i < contents.length; i += size) {
      const batch = contents.slice(i, i + size);
      const batchResults = await Promise.all(batch.map(content => this.analyze(content)));
      results.push(...batchResults);

      if (i + size < contents.length && this.batchDelayMs > 0) {
        await new Promise(resolve => setTimeout(resolve, this.batchDelayMs));
      }
    }

    return results;
  }

  lexicalScore(content: string): number {
    return this.ruleAnalyzer.score(content);
  }

  matchedIndicators(content: string): Record<string, string[]> {
    return this.ruleAnalyzer.matches(content);
  }

  /**
   * AI assessment with any failure collapsed into the fallback result
   */
  async aiScore(content: string): Promise<AiAnalysisResult> {
    let outcome: AiOutcome;
    try {
      outcome = await this.aiService.assess(content);
    } catch (error) {
      console.error('[RiskScorer] Unexpected AI analysis error:', error);
      return this.fallbackResult();
    }

    if (!outcome.ok) {
      console.error(`[RiskScorer] AI analysis failed (${outcome.reason}), using fallback`);
      return this.fallbackResult();
    }

    const { analysis } = outcome;
    return {
      risk_score: analysis.adjusted_risk_score,
      analysis,
      detailed_threats: {
        indicators: analysis.threat_indicators,
        reasoning: analysis.reasoning,
        actions: analysis.recommended_actions ?? []
      }
    };
  }

  /**
   * Neutral result used when the AI step cannot be completed or parsed
   */
  fallbackResult(): AiAnalysisResult {
    return {
      risk_score: FALLBACK_RISK_SCORE,
      analysis: {
        risk_score: FALLBACK_RISK_SCORE,
        threat_indicators: ['Analysis failed - using fallback'],
        reasoning: ['AI analysis encountered an error'],
        confidence: 0,
        timestamp: new Date().toISOString()
      },
      detailed_threats: {
        indicators: ['Analysis failed'],
        reasoning: ['Fallback analysis activated due to error'],
        actions: ['Please retry analysis or use alternative methods']
      }
    };
  }

  combine(rule: number, ai: number): number {
    return this.weights.rule * rule + this.weights.ai * ai;
  }

  getAiService(): OpenAIPhishingService {
    return this.aiService;
  }
}
