import process from 'node:process';

import { ServiceConfigError, formatConfigError, loadServiceConfig, type ServiceConfig } from './config';
import { createApp } from './app';

const describeWarehouse = (config: ServiceConfig) =>
  config.warehouse.kind === 'inline'
    ? { kind: 'inline', database: config.warehouse.database, seedFile: config.warehouse.seedFile }
    : { kind: 'snowflake', account: config.warehouse.account, database: config.warehouse.database };

const start = async () => {
  let config: ServiceConfig;
  try {
    config = loadServiceConfig();
  } catch (error) {
    if (error instanceof ServiceConfigError) {
      // eslint-disable-next-line no-console
      console.error(formatConfigError(error));
      process.exit(2);
    }
    throw error;
  }

  const { app, ctx } = await createApp(config);
  if (config.warehouse.kind === 'inline' && !config.warehouse.seedFile) {
    app.log.warn('Inline warehouse has no seed file; emissions routes will fail until tables exist');
  }

  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(
      {
        port: config.port,
        host: config.host,
        timeZone: config.timeZone,
        warehouse: describeWarehouse(config),
        queries: ctx.pipeline.queries
      },
      'Emissions service listening'
    );
  } catch (error) {
    app.log.error({ err: error }, 'Failed to start emissions service');
    process.exit(1);
  }

  let closing = false;
  const shutdown = async (signal: NodeJS.Signals) => {
    if (closing) {
      return;
    }
    closing = true;
    app.log.info({ signal }, 'Shutting down emissions service');
    try {
      await app.close();
      process.exit(0);
    } catch (error) {
      app.log.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.once('SIGTERM', () => void shutdown('SIGTERM'));
  process.once('SIGINT', () => void shutdown('SIGINT'));
};

start().catch((error) => {
  // eslint-disable-next-line no-console
  console.error('Uncaught error in emissions service', error);
  process.exit(1);
});
