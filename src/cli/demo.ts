import dotenv from 'dotenv';
import { loadScorerConfig, maskSecret } from '../config/scorer';
import { RiskScorer } from '../services/scoring/RiskScorer';

export const SAMPLE_EMAIL = `
Dear User,

We've noticed unusual activity in your account. Please verify your identity
immediately by clicking the link below and entering your login credentials.

If you don't act within 24 hours, your account will be suspended.

Best regards,
Security Team
`;

async function main(): Promise<void> {
  dotenv.config();

  const config = loadScorerConfig();
  console.log(`OpenAI API key loaded: ${maskSecret(config.openaiApiKey)}\n`);

  const scorer = new RiskScorer(config);
  const results = await scorer.analyze(SAMPLE_EMAIL);
  const matched = scorer.matchedIndicators(SAMPLE_EMAIL);

  console.log(`Analysis Results (model: ${scorer.getAiService().getModel()}):`);
  console.log(`Rule-based Score: ${results.rule_based_score}`);
  console.log(`Matched indicators: ${JSON.stringify(matched)}`);
  console.log(`OpenAI Analysis Score: ${results.ai_analysis.risk_score}`);
  console.log(`Combined Risk Score: ${results.combined_risk}`);
  console.log('\nDetailed AI Analysis:');
  console.log(JSON.stringify(results.ai_analysis.analysis, null, 2));
}

main().catch(error => {
  console.error('❌ Demo failed:', error);
  process.exitCode = 1;
});
