import express, { type Request, type Response, type NextFunction } from 'express';
import cors from 'cors';
import { loadConfig, type AppConfig } from './config';
import { DomainCheckController } from './controllers/domainCheck.controller';
import { LinkCheckController } from './controllers/linkCheck.controller';
import { HttpPageFetcher } from './crawlers/pageFetcher';
import { getErrorStatus } from './errors/http-error';
import { createDomainCheckRouter } from './routes/domainCheck.route';
import { createLinkCheckRouter } from './routes/linkCheck.route';
import { DomainCheckService } from './services/domainCheck.service';
import { LinkCheckService } from './services/linkCheck.service';
import { logger } from './utils/logger';

export interface ServerOptions {
  config?: AppConfig;
  linkCheckService?: LinkCheckService;
  domainCheckService?: DomainCheckService;
}

export function createServer(options: ServerOptions = {}) {
  const config = options.config ?? loadConfig();
  const fetcher = new HttpPageFetcher(config.USER_AGENT);
  const linkCheckService = options.linkCheckService ?? new LinkCheckService(fetcher);
  const domainCheckService = options.domainCheckService ?? new DomainCheckService(fetcher);

  const app = express();

  app.use(cors({
    origin: true,
    credentials: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  }));

  app.use(express.json({ limit: '1mb' }));

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', uptime: process.uptime() });
  });

  app.use('/api/link-check', createLinkCheckRouter(new LinkCheckController(linkCheckService, config)));
  app.use('/api/domain-check', createDomainCheckRouter(new DomainCheckController(domainCheckService, config)));

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = getErrorStatus(err);
    if (status === 400) {
      // body-parser rejects malformed JSON with a 400
      res.status(400).json({ success: false, error: 'Malformed JSON body' });
      return;
    }
    logger.error('Unhandled error', err);
    res.status(500).json({ success: false, error: 'Internal server error' });
  });

  return app;
}
