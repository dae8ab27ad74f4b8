import { Router } from 'express';
import { AnalysisController } from '../controllers/AnalysisController';
import { RiskScorer } from '../services/scoring/RiskScorer';

/**
 * Configure the analysis API routes
 */
export function createRoutes(scorer: RiskScorer): Router {
  const router = Router();

  const analysisController = new AnalysisController(scorer);

  router.post('/analyze', analysisController.analyzeEmail.bind(analysisController));
  router.post('/analyze/batch', analysisController.analyzeBatch.bind(analysisController));
  router.get('/analyze/status', analysisController.getStatus.bind(analysisController));

  return router;
}
