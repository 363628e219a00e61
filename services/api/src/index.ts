import express from 'express';
import type { Application, Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import morgan from 'morgan';
import { logger } from './logger.js';
import { loadConfig } from './config/env.js';
import type { AppConfig } from './config/env.js';
import { ErddapClient } from './lib/erddap/client.js';
import type { FetchLike } from './lib/erddap/client.js';
import { DatasetCatalog } from './lib/erddap/catalog.js';
import { CoverageService } from './lib/erddap/coverage.js';
import { createMetrics } from './metrics.js';
import type { Metrics } from './metrics.js';
import { coverageRouter } from './routes/coverage.js';

export interface CreateAppOptions {
  config?: Partial<AppConfig>;
  fetch?: FetchLike; // test injection
  now?: () => number; // test injection (catalog clock)
}

export interface AppContext {
  config: AppConfig;
  client: ErddapClient;
  catalog: DatasetCatalog;
  coverage: CoverageService;
  metrics: Metrics;
}

export function createContext(opts: CreateAppOptions = {}): AppContext {
  const config = { ...loadConfig(), ...opts.config };
  const metrics = createMetrics();
  const client = new ErddapClient({
    baseUrl: config.erddapUrl,
    timeoutMs: config.upstreamTimeoutMs,
    fetch: opts.fetch,
  });
  const catalog = new DatasetCatalog({
    publicUrl: config.publicUrl,
    loadListing: () => client.getDatasetListing(),
    ttlMs: config.catalogTtlSeconds * 1000,
    now: opts.now,
    onRefresh: () => metrics.catalogRefreshes.inc(),
  });
  const coverage = new CoverageService({ client, vocabHost: config.vocabHost });
  return { config, client, catalog, coverage, metrics };
}

export function createApp(opts: CreateAppOptions = {}): Express {
  const context = createContext(opts);
  const { config, metrics } = context;
  const app = express();
  app.use(cors());
  app.use(
    morgan('tiny', {
      stream: { write: (line: string) => logger.info(line.trim()) },
    }),
  );

  app.get('/health', (_req: Request, res: Response) => res.json({ ok: true }));
  app.get('/metrics', async (_req: Request, res: Response) => {
    try {
      res.set('Content-Type', metrics.register.contentType);
      res.end(await metrics.register.metrics());
    } catch (e) {
      res.status(500).send(e instanceof Error ? e.message : String(e));
    }
  });

  app.use(config.basePath || '/', coverageRouter(context));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'not found' });
  });
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    logger.error(err);
    res.status(500).json({ error: err.message });
  });

  return app;
}

/** Method and path of every route registered on the app, sorted by path. */
export function listEndpoints(app: Application, basePath: string): { methods: string; path: string }[] {
  const out: { methods: string; path: string }[] = [];
  type Layer = {
    route?: { path: string; methods: Record<string, boolean> };
    name?: string;
    handle?: { stack?: Layer[] };
  };
  const stack: Layer[] = app._router?.stack ?? [];
  const visit = (layers: Layer[], prefix: string) => {
    for (const layer of layers) {
      if (layer.route) {
        const methods = Object.keys(layer.route.methods)
          .filter((m) => m !== 'head' && m !== 'options')
          .map((m) => m.toUpperCase())
          .join(',');
        out.push({ methods, path: `${prefix}${layer.route.path}` });
      } else if (layer.name === 'router' && layer.handle?.stack) {
        visit(layer.handle.stack, basePath);
      }
    }
  };
  visit(stack, '');
  return out.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}
