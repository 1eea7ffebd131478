import { Router } from 'express';
import type { LinkCheckController } from '../controllers/linkCheck.controller';

export function createLinkCheckRouter(controller: LinkCheckController): Router {
  const router = Router();

  router.post('/start', controller.handleStart.bind(controller));
  router.get('/status', controller.getStatus.bind(controller));
  router.get('/results', controller.getResults.bind(controller));
  router.post('/stop', controller.handleStop.bind(controller));

  return router;
}
