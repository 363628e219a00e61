import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export interface Metrics {
  register: Registry;
  coverageRequests: Counter<'status'>;
  coverageDuration: Histogram;
  catalogRefreshes: Counter;
}

// One registry per app so tests can build several apps side by side
export function createMetrics(): Metrics {
  const register = new Registry();
  collectDefaultMetrics({ register });
  return {
    register,
    coverageRequests: new Counter({
      name: 'coverage_requests_total',
      help: 'Coverage requests by response status',
      registers: [register],
      labelNames: ['status'],
    }),
    coverageDuration: new Histogram({
      name: 'coverage_request_duration_seconds',
      help: 'Time to fetch and assemble a coverage',
      registers: [register],
      buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10, 30],
    }),
    catalogRefreshes: new Counter({
      name: 'catalog_refreshes_total',
      help: 'Dataset list refreshes',
      registers: [register],
    }),
  };
}
