import { Router } from 'express';
import { createMixController } from '../controllers/mix.controller';
import { validate, schemas } from '../middleware/validate';
import type { MixEngine } from '../services/mix-engine';

export const createMixRoutes = (engine: MixEngine): Router => {
  const router = Router();
  const mixController = createMixController(engine);

  // Planning
  router.post('/sequence', validate(schemas.sequence), mixController.sequence);
  router.post('/suggest-next', validate(schemas.suggestNext), mixController.suggestNext);

  // Exports
  router.post('/exports', validate(schemas.createExport), mixController.createExport);
  router.get('/exports/:id', mixController.getExport);
  router.post('/exports/:id/cancel', mixController.cancelExport);

  return router;
};

export default createMixRoutes;
