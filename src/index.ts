#!/usr/bin/env node
import { createApplication, shutdownApplication } from './app';
import { CLIParser } from './cli/CLIParser';

async function main(): Promise<void> {
  const parser = new CLIParser();
  const options = parser.parse();

  if (options.help) {
    CLIParser.printHelp();
    return;
  }

  const app = createApplication(options.config);

  const shutdown = (): void => {
    shutdownApplication(app)
      .then(() => process.exit(0))
      .catch((err) => {
        console.error('Shutdown failed:', err);
        process.exit(1);
      });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  await app.httpServer.start();
  console.log('JSON KV Server - Ready!');
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
