#!/usr/bin/env node
import * as Sentry from '@sentry/node';
import { version } from 'papaya';

import { createApp } from './app';
import { ConfigurationError, loadConfig } from './config';
import log, { setLogLevel } from './logger';

async function main(): Promise<void> {
  const config = await loadConfig();
  setLogLevel(config.logLevel);
  log.info(`papaya/${version}`);
  log.debug('Loaded configuration', { config });

  if (config.sentryDsn) {
    Sentry.init({
      dsn: config.sentryDsn,
      release: `papaya@${version}`,
    });
  }

  const app = createApp(config);
  app.listen(config.port, config.host, () => {
    log.info(`server started at http://${config.host}:${config.port}`);
  });
}

main().catch((err) => {
  if (err instanceof ConfigurationError) {
    err.problems.forEach((problem) => log.error(problem));
  } else {
    log.error(`Failed to start server: ${err}`);
  }
  process.exitCode = 1;
});

process.on('unhandledRejection', (err) => {
  log.error(`Unhandled promise rejection: ${err}`);
});
