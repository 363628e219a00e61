import type { Coverage, ErrorPayload } from '@erddap-covjson/shared';
import { ServiceError, UpstreamError } from '../../errors.js';
import { logger } from '../../logger.js';
import { assembleCoverage } from '../covjson/assemble.js';
import type { ErddapClient, TableResult } from './client.js';
import { DEFAULT_VOCAB_HOST, EMPTY_METADATA, indexMetadata, resolveVariables } from './metadata.js';
import type { MetadataIndex } from './metadata.js';

export type CoverageResult = { body: Coverage | ErrorPayload; status: number };

export interface CoverageServiceOptions {
  client: ErddapClient;
  vocabHost?: string;
}

export class CoverageService {
  private readonly client: ErddapClient;
  private readonly vocabHost: string;

  constructor({ client, vocabHost = DEFAULT_VOCAB_HOST }: CoverageServiceOptions) {
    this.client = client;
    this.vocabHost = vocabHost;
  }

  // Metadata is optional: an unreachable or unusable info endpoint leaves
  // names and units to the column names.
  private async metadataFor(datasetId: string): Promise<MetadataIndex> {
    let meta: TableResult;
    try {
      meta = await this.client.getMetadata(datasetId);
    } catch (e) {
      if (!(e instanceof UpstreamError)) throw e;
      logger.warn(`metadata for ${datasetId} unavailable (${e.message}), using column names`);
      return EMPTY_METADATA;
    }
    if (!meta.ok) {
      logger.warn(`metadata for ${datasetId} unavailable (HTTP ${meta.status}), using column names`);
      return EMPTY_METADATA;
    }
    return indexMetadata(meta.table);
  }

  /**
   * Fetches `datasetId` rows for the raw query string, resolves column
   * metadata and assembles a CoverageJSON document. Upstream HTTP errors are
   * passed through with their status and body.
   */
  async fetchCoverage(datasetId: string, rawQuery: string): Promise<CoverageResult> {
    logger.info(`Getting data from ${this.client.tabledapUrl(datasetId, rawQuery)}`);
    try {
      const fetchStart = Date.now();
      const data = await this.client.getData(datasetId, rawQuery);
      if (!data.ok) {
        logger.error(`HTTP CODE: ${data.status}`);
        logger.error(`HTTP ERROR: ${data.body}`);
        return { body: { error: data.body }, status: data.status };
      }
      const index = await this.metadataFor(datasetId);
      const fetchMs = Date.now() - fetchStart;

      const formatStart = Date.now();
      const { variables, problems } = resolveVariables(index, data.table.columnNames, this.vocabHost);
      for (const p of problems) logger.warn(`${datasetId}: ${p.message}`);
      const coverage = assembleCoverage(data.table, variables);
      logger.debug(`   getting data took ${fetchMs.toFixed(2)} msecs`);
      logger.debug(`   formatting response took ${(Date.now() - formatStart).toFixed(2)} msecs`);
      return { body: coverage, status: 200 };
    } catch (e) {
      if (e instanceof ServiceError) {
        logger.warn(`${datasetId}: ${e.message}`);
        return { body: { error: e.message }, status: e.status };
      }
      throw e;
    }
  }
}
