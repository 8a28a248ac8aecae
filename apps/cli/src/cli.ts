#!/usr/bin/env node
import 'dotenv/config';
import { USAGE, loadConfig } from './config/app-config.js';
import { createLogger } from './logging/logger.js';
import { buildServices, runList, runLive, runLoad, runOnceMode } from './app.js';

async function main(): Promise<number> {
  const config = loadConfig();
  const { command } = config;
  const out = (line: string): void => console.log(line);

  if (command.kind === 'help') {
    out(USAGE);
    return 0;
  }

  const logger = createLogger(config.logging);
  const services = buildServices(logger);

  switch (command.kind) {
    case 'list':
      await runList(config.dataDir, services, out);
      return 0;
    case 'load':
      await runLoad(command.path, services, out, logger);
      return 0;
    case 'once':
      await runOnceMode(config, services, out);
      return 0;
    case 'live': {
      const stop = new AbortController();
      const shutdown = (): void => stop.abort();
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
      const { outcome } = await runLive(config, services, out, logger, stop.signal);
      logger.info(`session ended: ${outcome.reason}`);
      return 0;
    }
  }
}

main()
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    console.error(`[linetest] ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  });
