import { Router } from 'express';
import type { MixEngine } from '../services/mix-engine';
import { createAnalysisRoutes } from './analysis.routes';
import { createMixRoutes } from './mix.routes';

export const createApiRoutes = (engine: MixEngine): Router => {
  const router = Router();

  // Mount routes
  router.use('/analysis', createAnalysisRoutes(engine));
  router.use('/mixes', createMixRoutes(engine));

  // Health check for API
  router.get('/health', (req, res) => {
    res.json({
      success: true,
      message: 'API is running',
      dispatch: engine.dispatcher.mode,
      timestamp: new Date().toISOString(),
    });
  });

  return router;
};

export default createApiRoutes;
