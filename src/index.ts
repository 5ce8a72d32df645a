import { createLogger } from './core/Logger';
import { ConfigLoader } from './config';
import { Orchestrator } from './core/Orchestrator';

const VERSION = '1.0.0';
const logger = createLogger('Main');

async function main(): Promise<void> {
  const configFolder = process.env.CONFIG_FOLDER || './config';

  logger.info(`Finbridge v${VERSION} starting...`);
  logger.info(`Config folder: ${configFolder}`);

  const configLoader = new ConfigLoader(configFolder);
  const config = configLoader.load();

  if (config.server.enabled) {
    logger.info(`Control endpoint: http://0.0.0.0:${config.server.port}/health`);
  }

  const orchestrator = new Orchestrator(config, { version: VERSION });
  await orchestrator.start();

  logger.info('Finbridge is running. Press Ctrl+C to stop.');
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  logger.error(`Fatal error: ${message}`);
  process.exit(1);
});
