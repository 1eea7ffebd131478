import type { Request, Response } from 'express';
import { z } from 'zod';
import type { AppConfig } from '../config';
import type { DomainCheckService } from '../services/domainCheck.service';
import { DOMAIN_RESULT_FILTERS } from '../types/domainCheck';
import { parseHostList } from '../utils/input';
import { sendError } from './respond';

const hostListSchema = z.union([z.string(), z.array(z.string())]);

const startSchema = z.object({
  domains: hostListSchema.default(''),
  targets: hostListSchema.default(''),
  threads: z.coerce.number().int().positive().optional(),
  timeout: z.coerce.number().int().positive().optional(),
});

const resultsQuerySchema = z.object({
  status: z.enum(DOMAIN_RESULT_FILTERS).default('all'),
  page: z.coerce.number().int().min(1).default(1),
  pageSize: z.coerce.number().int().min(0).default(50),
});

export class DomainCheckController {
  constructor(
    private readonly domainCheckService: DomainCheckService,
    private readonly config: AppConfig,
  ) {}

  handleStart(req: Request, res: Response) {
    try {
      const parsed = startSchema.parse(req.body ?? {});
      const domains = parseHostList(parsed.domains);
      const targets = parseHostList(parsed.targets);

      const accepted = this.domainCheckService.start(domains, targets, {
        concurrency: Math.min(parsed.threads ?? this.config.DEFAULT_CONCURRENCY, this.config.MAX_CONCURRENCY),
        timeoutSeconds: parsed.timeout ?? this.config.DEFAULT_TIMEOUT_SECONDS,
      });

      return res.status(202).json({
        status: 'started',
        count: accepted.count,
        targets: new Set(targets).size,
      });
    } catch (error) {
      return sendError(res, error, 'Failed to start domain check');
    }
  }

  getStatus(_req: Request, res: Response) {
    return res.json(this.domainCheckService.getStatus());
  }

  getResults(req: Request, res: Response) {
    try {
      const { status, page, pageSize } = resultsQuerySchema.parse(req.query);
      return res.json(this.domainCheckService.getResults(status, { page, pageSize }));
    } catch (error) {
      return sendError(res, error, 'Failed to fetch domain check results');
    }
  }

  handleStop(_req: Request, res: Response) {
    const status = this.domainCheckService.stop();
    return res.json({ status: 'stopped', running: status.running });
  }
}
