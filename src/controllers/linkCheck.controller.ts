import type { Request, Response } from 'express';
import { z } from 'zod';
import type { AppConfig } from '../config';
import type { LinkCheckService } from '../services/linkCheck.service';
import { LINK_RESULT_FILTERS } from '../types/linkCheck';
import { parseLinkCsv, rowsFromInput } from '../utils/input';
import { sendError } from './respond';

const linkRowSchema = z.object({
  site: z.string().optional(),
  link: z.string().optional(),
  anchor: z.string().optional(),
});

const startSchema = z.object({
  rows: z.array(linkRowSchema).optional(),
  csv: z.string().optional(),
  threads: z.coerce.number().int().positive().optional(),
  timeout: z.coerce.number().int().positive().optional(),
});

const resultsQuerySchema = z.object({
  status: z.enum(LINK_RESULT_FILTERS).default('all'),
  page: z.coerce.number().int().min(1).default(1),
  pageSize: z.coerce.number().int().min(0).default(50),
});

export class LinkCheckController {
  constructor(
    private readonly linkCheckService: LinkCheckService,
    private readonly config: AppConfig,
  ) {}

  handleStart(req: Request, res: Response) {
    try {
      const parsed = startSchema.parse(req.body ?? {});
      // Explicit rows win over CSV text when both are sent
      const rows = parsed.rows ? rowsFromInput(parsed.rows) : parseLinkCsv(parsed.csv ?? '');

      const accepted = this.linkCheckService.start(rows, {
        concurrency: Math.min(parsed.threads ?? this.config.DEFAULT_CONCURRENCY, this.config.MAX_CONCURRENCY),
        timeoutSeconds: parsed.timeout ?? this.config.DEFAULT_TIMEOUT_SECONDS,
      });

      return res.status(202).json({ status: 'started', count: accepted.count });
    } catch (error) {
      return sendError(res, error, 'Failed to start link check');
    }
  }

  getStatus(_req: Request, res: Response) {
    return res.json(this.linkCheckService.getStatus());
  }

  getResults(req: Request, res: Response) {
    try {
      const { status, page, pageSize } = resultsQuerySchema.parse(req.query);
      return res.json(this.linkCheckService.getResults(status, { page, pageSize }));
    } catch (error) {
      return sendError(res, error, 'Failed to fetch link check results');
    }
  }

  handleStop(_req: Request, res: Response) {
    const status = this.linkCheckService.stop();
    return res.json({ status: 'stopped', running: status.running });
  }
}
