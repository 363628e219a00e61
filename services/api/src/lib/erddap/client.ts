import { fetch as undiciFetch } from 'undici';
import type { ErddapTable } from '@erddap-covjson/shared';
import { ZodError } from 'zod';
import { UpstreamError, errorMessage } from '../../errors.js';
import { parseTableEnvelope } from './table.js';

export type FetchLike = (url: string, init?: { signal?: AbortSignal }) => Promise<{
  ok: boolean;
  status: number;
  text(): Promise<string>;
}>;

export interface ErddapClientOptions {
  baseUrl: string;
  timeoutMs?: number;
  fetch?: FetchLike;
}

export type TableResult = { ok: true; status: number; table: ErddapTable } | { ok: false; status: number; body: string };

export class ErddapClient {
  readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly doFetch: FetchLike;

  constructor({ baseUrl, timeoutMs = 30_000, fetch }: ErddapClientOptions) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.timeoutMs = timeoutMs;
    this.doFetch = fetch ?? undiciFetch;
  }

  tabledapUrl(datasetId: string, rawQuery: string): string {
    const url = `${this.baseUrl}/tabledap/${encodeURIComponent(datasetId)}.json`;
    return rawQuery ? `${url}?${rawQuery}` : url;
  }

  infoUrl(datasetId: string): string {
    return `${this.baseUrl}/info/${encodeURIComponent(datasetId)}/index.json`;
  }

  searchUrl(): string {
    return `${this.baseUrl}/search/advanced.csv?page=1&itemsPerPage=1000000&protocol=tabledap&searchFor=all`;
  }

  private async get(url: string): Promise<{ ok: boolean; status: number; body: string }> {
    try {
      const r = await this.doFetch(url, { signal: AbortSignal.timeout(this.timeoutMs) });
      return { ok: r.ok, status: r.status, body: await r.text() };
    } catch (e) {
      const reason = e instanceof Error && e.name === 'TimeoutError' ? 'timeout' : errorMessage(e);
      throw new UpstreamError(`ERDDAP request failed (${url}): ${reason}`);
    }
  }

  private async table(url: string): Promise<TableResult> {
    const { ok, status, body } = await this.get(url);
    if (!ok) return { ok, status, body };
    try {
      return { ok, status, table: parseTableEnvelope(JSON.parse(body)) };
    } catch (e) {
      const detail = e instanceof ZodError ? e.issues.map((i) => i.message).join('; ') : errorMessage(e);
      throw new UpstreamError(`ERDDAP returned an invalid table (${url}): ${detail}`);
    }
  }

  /** Rows of `tabledap/{id}.json`; the query string is forwarded untouched. */
  getData(datasetId: string, rawQuery: string): Promise<TableResult> {
    return this.table(this.tabledapUrl(datasetId, rawQuery));
  }

  /** Attribute table of `info/{id}/index.json`. */
  getMetadata(datasetId: string): Promise<TableResult> {
    return this.table(this.infoUrl(datasetId));
  }

  async getDatasetListing(): Promise<string> {
    const url = this.searchUrl();
    const { ok, status, body } = await this.get(url);
    if (!ok) throw new UpstreamError(`ERDDAP search failed with HTTP ${status}`);
    return body;
  }
}
