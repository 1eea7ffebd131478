import { Router } from 'express';
import type { DomainCheckController } from '../controllers/domainCheck.controller';

export function createDomainCheckRouter(controller: DomainCheckController): Router {
  const router = Router();

  router.post('/start', controller.handleStart.bind(controller));
  router.get('/status', controller.getStatus.bind(controller));
  router.get('/results', controller.getResults.bind(controller));
  router.post('/stop', controller.handleStop.bind(controller));

  return router;
}
