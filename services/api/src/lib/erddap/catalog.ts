import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import type { DatasetCatalogMap } from '@erddap-covjson/shared';
import { CatalogListingError } from '../../errors.js';
import { logger } from '../../logger.js';

const DATASET_ID = 'Dataset ID';
const ListingSchema = z.array(z.record(z.string()));

/**
 * Dataset ids from an ERDDAP search listing (CSV). The first data row is
 * dropped: ERDDAP's table formats carry a units row there.
 */
export function parseDatasetListing(csv: string): string[] {
  const records = ListingSchema.parse(
    parse(csv, { columns: true, skipEmptyLines: true, relaxColumnCount: true, trim: true, bom: true }),
  );
  if (records.length && !(DATASET_ID in records[0])) {
    throw new CatalogListingError(`dataset listing has no "${DATASET_ID}" column`);
  }
  return records
    .slice(1)
    .map((r) => r[DATASET_ID] ?? '')
    .filter(Boolean);
}

export interface DatasetCatalogOptions {
  /** Public base URL of this API; entries are `{publicUrl}/{id}`. */
  publicUrl: string;
  loadListing: () => Promise<string>;
  ttlMs?: number;
  now?: () => number;
  onRefresh?: (datasets: number) => void;
}

type Snapshot = { entries: DatasetCatalogMap; refreshedAt: number };

export class DatasetCatalog {
  private snapshot: Snapshot | null = null;
  private inflight: Promise<DatasetCatalogMap> | null = null;
  private readonly publicUrl: string;
  private readonly loadListing: () => Promise<string>;
  private readonly now: () => number;
  private readonly onRefresh?: (datasets: number) => void;
  readonly ttlMs: number;

  constructor({ publicUrl, loadListing, ttlMs = 3_600_000, now = Date.now, onRefresh }: DatasetCatalogOptions) {
    this.publicUrl = publicUrl.replace(/\/+$/, '');
    this.loadListing = loadListing;
    this.ttlMs = ttlMs;
    this.now = now;
    this.onRefresh = onRefresh;
  }

  isStale(): boolean {
    return !this.snapshot || this.now() - this.snapshot.refreshedAt > this.ttlMs;
  }

  /** Cached id -> URL mapping; rebuilt wholesale once older than the TTL. */
  async getCatalog(): Promise<DatasetCatalogMap> {
    if (this.snapshot && !this.isStale()) return this.snapshot.entries;
    // concurrent callers share one refresh
    this.inflight ??= this.refresh().finally(() => {
      this.inflight = null;
    });
    return this.inflight;
  }

  private async refresh(): Promise<DatasetCatalogMap> {
    logger.info('Refreshing dataset list');
    const ids = parseDatasetListing(await this.loadListing());
    const entries: DatasetCatalogMap = {};
    for (const id of ids) entries[id] = `${this.publicUrl}/${id}`;
    this.snapshot = { entries, refreshedAt: this.now() };
    this.onRefresh?.(ids.length);
    logger.debug(`dataset list holds ${ids.length} datasets`);
    return entries;
  }
}
