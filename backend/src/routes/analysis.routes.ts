import { Router } from 'express';
import { createAnalysisController } from '../controllers/analysis.controller';
import { validate, schemas } from '../middleware/validate';
import type { MixEngine } from '../services/mix-engine';

export const createAnalysisRoutes = (engine: MixEngine): Router => {
  const router = Router();
  const analysisController = createAnalysisController(engine);

  router.post('/', validate(schemas.analyze), analysisController.analyze);

  return router;
};

export default createAnalysisRoutes;
