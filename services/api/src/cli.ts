import yargs from 'yargs';
import type { ConfigOverrides } from './config/env.js';

/**
 * Builds the CLI argument parser. Flags left unset fall through to the
 * environment and then to defaults (see config/env.ts).
 */
export function parser(argv: string[]) {
  return yargs(argv)
    .scriptName('erddap-covjson')
    .usage('Usage: $0 [--erddap-url <url>] [--url <public url>] [--port <n>]')
    .option('erddap-url', { alias: 'e', type: 'string', describe: 'ERDDAP URL to download data from' })
    .option('url', { type: 'string', describe: 'public URL of this API (used in the dataset list)' })
    .option('port', { alias: 'p', type: 'number', describe: 'port to listen on' })
    .option('base-path', { type: 'string', describe: 'path the API is mounted under' })
    .option('catalog-ttl', { type: 'number', describe: 'seconds between dataset list refreshes' })
    .option('timeout', { type: 'number', describe: 'upstream request timeout in ms' })
    .option('vocab-host', { type: 'string', describe: 'host of the controlled vocabulary server' })
    .option('log-level', { type: 'string', choices: ['debug', 'info', 'warn', 'error'] })
    .option('log-dir', { type: 'string', describe: 'log folder; empty disables file logs' })
    .option('usage-interval', { type: 'number', describe: 'seconds between CPU/RAM log lines; 0 disables' })
    .strict()
    .help();
}

export function parseArgs(argv: string[]): ConfigOverrides {
  const args = parser(argv).parseSync();
  return {
    erddapUrl: args['erddap-url'],
    publicUrl: args.url,
    port: args.port,
    basePath: args['base-path'],
    catalogTtlSeconds: args['catalog-ttl'],
    upstreamTimeoutMs: args.timeout,
    vocabHost: args['vocab-host'],
    logLevel: args['log-level'],
    logDir: args['log-dir'],
    usageIntervalSeconds: args['usage-interval'],
  };
}
