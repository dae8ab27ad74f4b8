import { IndicatorTable } from '../../types/models';
import { DEFAULT_INDICATORS, INDICATOR_WEIGHT } from './indicators';

/**
 * Keyword heuristic: every listed phrase found in the email adds a fixed weight
 */
export class RuleBasedAnalyzer {
  constructor(private readonly indicators: IndicatorTable = DEFAULT_INDICATORS) {}

  /**
   * Score content in [0, 1]. Matches in the same category count independently.
   */
  score(content: string): number {
    const normalized = content.toLowerCase();
    let score = 0;

    for (const phrases of Object.values(this.indicators)) {
      for (const phrase of phrases) {
        if (normalized.includes(phrase)) {
          score += INDICATOR_WEIGHT;
        }
      }
    }

    return Math.min(score, 1);
  }

  /**
   * List the phrases found in the content, grouped by category
   */
  matches(content: string): Record<string, string[]> {
    const normalized = content.toLowerCase();
    const found: Record<string, string[]> = {};

    for (const [category, phrases] of Object.entries(this.indicators)) {
      const hits = phrases.filter(phrase => normalized.includes(phrase));
      if (hits.length > 0) {
        found[category] = hits;
      }
    }

    return found;
  }
}
