import { Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { RiskScorer } from '../services/scoring/RiskScorer';
import { validateAnalyzeRequest, validateBatchAnalyzeRequest } from '../models/validation';

/**
 * AnalysisController handles HTTP requests for phishing risk analysis
 */
export class AnalysisController {
  constructor(private scorer: RiskScorer) {}

  /**
   * POST /api/analyze - Score a single email body
   */
  async analyzeEmail(req: Request, res: Response): Promise<void> {
    const { error, value } = validateAnalyzeRequest(req.body);
    if (error || !value) {
      res.status(400).json({
        error: 'Validation error',
        message: error ? error.message : 'content is required'
      });
      return;
    }

    try {
      const analysisId = uuidv4();
      const result = await this.scorer.analyze(value.content);
      console.log(`[Analyze] ${analysisId} rule=${result.rule_based_score.toFixed(2)} combined=${result.combined_risk.toFixed(2)}`);

      res.json({ analysisId, result });
    } catch (err) {
      console.error('❌ Failed to analyze email:', err);
      res.status(500).json({
        error: 'Internal server error',
        message: 'Failed to analyze email'
      });
    }
  }

  /**
   * POST /api/analyze/batch - Score several email bodies
   */
  async analyzeBatch(req: Request, res: Response): Promise<void> {
    const { error, value } = validateBatchAnalyzeRequest(req.body);
    if (error || !value) {
      res.status(400).json({
        error: 'Validation error',
        message: error ? error.message : 'emails are required'
      });
      return;
    }

    try {
      const results = await this.scorer.analyzeBatch(value.emails, value.batchSize);

      res.json({
        results: results.map(result => ({ analysisId: uuidv4(), result })),
        total: results.length
      });
    } catch (err) {
      console.error('❌ Failed to analyze email batch:', err);
      res.status(500).json({
        error: 'Internal server error',
        message: 'Failed to analyze emails'
      });
    }
  }

  /**
   * GET /api/analyze/status - Report model and provider availability
   */
  async getStatus(req: Request, res: Response): Promise<void> {
    try {
      const stats = await this.scorer.getAiService().getUsageStats();
      res.json(stats);
    } catch (err) {
      console.error('❌ Failed to get analysis status:', err);
      res.status(500).json({
        error: 'Internal server error',
        message: 'Failed to get analysis status'
      });
    }
  }
}
