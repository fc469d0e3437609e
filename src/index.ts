import './config/loadEnv';

import type { Server } from 'http';
import { ZodError } from 'zod';

import { createApp } from './app';
import { getAppConfig } from './config/appConfig';
import { parseCliArgs } from './config/cliArgs';
import { getTeslafiConfig } from './config/teslafiConfig';
import { createExporterService } from './services/exporter.service';
import { logger } from './utils/logger';

let server: Server | undefined;

const start = async (): Promise<void> => {
  const cliArgs = parseCliArgs(process.argv.slice(2));
  const appConfig = getAppConfig({ port: cliArgs.port });
  const teslafiConfig = getTeslafiConfig({ apiToken: cliArgs.apiToken });

  const exporter = createExporterService(teslafiConfig);
  const app = createApp({ exporter, config: appConfig });

  await new Promise<void>((resolve, reject) => {
    server = app.listen(appConfig.port, () => {
      logger.info(
        {
          port: appConfig.port,
          metricsPath: appConfig.metrics.path,
          chargeTimeUnit: teslafiConfig.chargeTimeUnit,
        },
        'exporter listening',
      );
      resolve();
    });
    server.once('error', reject);
  });
};

const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
  logger.info({ signal }, 'shutdown signal received');

  await new Promise<void>((resolve, reject) => {
    if (!server) {
      resolve();
      return;
    }

    server.close((error) => {
      if (error) {
        reject(error);
        return;
      }

      resolve();
    });
  });

  logger.info('shutdown complete');
  process.exit(0);
};

start().catch((error) => {
  if (error instanceof ZodError) {
    logger.error({ issues: error.flatten().fieldErrors }, 'invalid configuration');
  } else {
    logger.error({ error }, 'failed to start exporter');
  }
  process.exit(1);
});

const shutdownSignals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGQUIT'];

shutdownSignals.forEach((signal) => {
  process.on(signal, () => {
    shutdown(signal).catch((error) => {
      logger.error({ error }, 'error during shutdown');
      process.exit(1);
    });
  });
});
