import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import dotenv from 'dotenv';
import { createRoutes } from './routes';
import { loadScorerConfig, maskSecret } from './config/scorer';
import { RiskScorer } from './services/scoring/RiskScorer';

export * from './models';
export { RiskScorer, RiskScorerOptions, FALLBACK_RISK_SCORE } from './services/scoring/RiskScorer';
export { OpenAIPhishingService } from './services/ml/OpenAIPhishingService';
export { DEFAULT_INDICATORS, createIndicatorTable } from './services/scoring/indicators';
export { loadScorerConfig } from './config/scorer';

export const SERVICE_NAME = 'phishing-risk-scorer';
export const SERVICE_VERSION = '1.0.0';

/**
 * Build the Express application around a scorer
 */
export function createApp(scorer: RiskScorer): express.Application {
  const app = express();

  // Middleware
  app.use(helmet());
  app.use(cors({
    origin: process.env.FRONTEND_URL || '*'
  }));
  app.use(express.json({ limit: '10mb' }));

  // Health check endpoint
  app.get('/health', (req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      service: SERVICE_NAME,
      version: SERVICE_VERSION
    });
  });

  app.use('/api', createRoutes(scorer));

  // 404 handler
  app.use('*', (req, res) => {
    res.status(404).json({
      error: 'Not Found',
      message: `Route ${req.method} ${req.originalUrl} not found`,
      availableRoutes: {
        health: 'GET /health',
        analyze: 'POST /api/analyze',
        batch: 'POST /api/analyze/batch',
        status: 'GET /api/analyze/status'
      }
    });
  });

  // Error handler
  app.use((error: Error, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    console.error('❌ Unhandled error:', error);
    if ('type' in error && error.type === 'entity.parse.failed') {
      res.status(400).json({
        error: 'Bad Request',
        message: 'Request body is not valid JSON'
      });
      return;
    }
    res.status(500).json({
      error: 'Internal Server Error',
      message: 'An unexpected error occurred'
    });
  });

  return app;
}

function startServer(): void {
  // Load environment variables
  dotenv.config();

  try {
    console.log('🔧 Initializing scorer...');
    const config = loadScorerConfig();
    console.log(`🔑 OpenAI API key loaded: ${maskSecret(config.openaiApiKey)}`);

    const app = createApp(new RiskScorer(config));
    const port = Number(process.env.PORT) || 3000;

    app.listen(port, () => {
      console.log(`🚀 Server running on port ${port}`);
      console.log(`🛡️  Phishing Risk Scorer API (model: ${config.model})`);
      console.log(`🏥 Health check: http://localhost:${port}/health`);
    });
  } catch (error) {
    console.error('❌ Failed to start server:', error);
    process.exit(1);
  }
}

if (require.main === module) {
  startServer();
}
