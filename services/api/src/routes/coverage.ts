import { Router } from 'express';
import type { Request, Response } from 'express';
import { errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import type { DatasetCatalog } from '../lib/erddap/catalog.js';
import type { CoverageService } from '../lib/erddap/coverage.js';
import type { Metrics } from '../metrics.js';
import { noStore, shortLived60 } from '../middleware/cache.js';

export interface CoverageRouterDeps {
  catalog: DatasetCatalog;
  coverage: CoverageService;
  metrics: Metrics;
}

// Everything after the first "?" of the request URL, untouched
export function rawQueryString(req: Request): string {
  const i = req.originalUrl.indexOf('?');
  return i < 0 ? '' : req.originalUrl.slice(i + 1);
}

export function coverageRouter({ catalog, coverage, metrics }: CoverageRouterDeps): Router {
  const router = Router();

  router.get('/help', (_req: Request, res: Response) => {
    res.json({ message: 'it works!' });
  });

  router.get('/datasets', shortLived60, async (_req: Request, res: Response) => {
    try {
      res.json(await catalog.getCatalog());
    } catch (e) {
      logger.error(`dataset list unavailable: ${errorMessage(e)}`);
      res.status(502).json({ error: errorMessage(e) });
    }
  });

  router.get('/:datasetId', noStore, async (req: Request, res: Response) => {
    const { datasetId } = req.params;
    logger.info(`Trying to fetch data from ${datasetId}`);
    const end = metrics.coverageDuration.startTimer();
    try {
      const { body, status } = await coverage.fetchCoverage(datasetId, rawQueryString(req));
      metrics.coverageRequests.inc({ status: String(status) });
      res.status(status).json(body);
    } catch (e) {
      metrics.coverageRequests.inc({ status: '500' });
      logger.error(e instanceof Error ? e : errorMessage(e));
      res.status(500).json({ error: errorMessage(e) });
    } finally {
      end();
    }
  });

  return router;
}
