import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { createApp } from './app';
import { loadConfig } from './config';
import { buildPipeline } from './container';
import { createLogger, setConsoleLogLevel } from './lib/serverLogs';

const explicitEnv = process.env.ENV_FILE
  ? process.env.ENV_FILE
  : fileURLToPath(new URL('../.env', import.meta.url));

dotenv.config({ path: explicitEnv });

const config = loadConfig();
setConsoleLogLevel(config.logLevel);

const log = createLogger('server');
if (!config.fmp.apiKey) log.warn('FMP_API_KEY not set; equity quotes, indicators and calendar are disabled');
if (!config.coingecko.apiKey) log.warn('COINGECKO_API_KEY not set; crypto lookups are disabled');

const app = createApp(buildPipeline(config));

app.listen(config.port, () => {
  log.info(`listening on http://localhost:${config.port}`);
});
