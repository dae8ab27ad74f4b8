import { IndicatorTable } from '../../types/models';

export const INDICATOR_WEIGHT = 0.2;

export const DEFAULT_INDICATORS: IndicatorTable = createIndicatorTable({
  urgency: ['immediate action', 'urgent', 'act now'],
  threats: ['account suspended', 'security alert'],
  requests: ['verify your account', 'confirm your identity'],
  credentials: ['login', 'password', 'username']
});

/**
 * Copy and deep-freeze an indicator table. Phrases are lowercased so matching
 * against lowercased content stays case-insensitive.
 */
export function createIndicatorTable(source: Record<string, readonly string[]>): IndicatorTable {
  const table: Record<string, readonly string[]> = {};
  for (const [category, phrases] of Object.entries(source)) {
    table[category] = Object.freeze(phrases.map(phrase => phrase.toLowerCase()));
  }
  return Object.freeze(table);
}
