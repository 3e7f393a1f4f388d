import process from 'node:process';

import pino from 'pino';

import { ServiceConfigError, formatConfigError, loadServiceConfig } from '../config';
import { publishAggregates } from '../jobs/publishAggregates';
import { createLoggerOptions } from '../logger';
import { createWarehouseConnector } from '../warehouse';

const run = async () => {
  const config = loadServiceConfig();
  const logger = pino(createLoggerOptions(config.logLevel));
  const report = await publishAggregates({
    config,
    connector: await createWarehouseConnector(config.warehouse),
    logger
  });
  logger.info({ report }, 'Published emissions aggregates');
};

run().catch((error) => {
  if (error instanceof ServiceConfigError) {
    // eslint-disable-next-line no-console
    console.error(formatConfigError(error));
    process.exit(2);
  }
  // eslint-disable-next-line no-console
  console.error('Failed to publish emissions aggregates', error);
  process.exit(1);
});
