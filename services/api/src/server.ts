import 'dotenv/config';
import { hideBin } from 'yargs/helpers';
import { parseArgs } from './cli.js';
import { loadConfig } from './config/env.js';
import { createApp, listEndpoints } from './index.js';
import { setupLog } from './logger.js';
import { startUsageMonitor } from './monitor/usage.js';

const config = loadConfig(parseArgs(hideBin(process.argv)));
const log = setupLog('covjson-api', config.logDir, config.logLevel);
if (config.usageIntervalSeconds > 0) startUsageMonitor(config.usageIntervalSeconds * 1000);

const app = createApp({ config });
log.info('--- Available API Endpoints ---');
for (const { methods, path } of listEndpoints(app, config.basePath)) {
  log.info(`Methods: ${methods.padEnd(10)} | Path: ${path}`);
}
log.info('-------------------------------');

app.listen(config.port, () => log.info(`covjson api up on port ${config.port}, ERDDAP ${config.erddapUrl}`));
