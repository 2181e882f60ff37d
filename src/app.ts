import { MemoryStore } from './storage/MemoryStore';
import { HTTPServer } from './server/HTTPServer';
import { ServerConfig } from './common/Config';
import { Logger, consoleLogger } from './common/Logger';
import { MutationEvent } from './interfaces/Storage';

export interface Application {
  store: MemoryStore;
  httpServer: HTTPServer;
}

export function describeMutation(event: MutationEvent): string {
  switch (event.type) {
    case 'insert':
      return `Inserting new key-value pair: ${event.key} --> ${JSON.stringify(event.value)}`;
    case 'overwrite':
      return `Overriding existing key ${event.key} --> ${JSON.stringify(event.previous)} with new value: ${JSON.stringify(event.value)}`;
    case 'delete':
      return `Deleted key-value pair: ${event.key} --> ${JSON.stringify(event.value)}`;
    case 'delete-missing':
      return `Tried to delete non-existent key: ${event.key}`;
  }
}

export function createApplication(config: ServerConfig, logger: Logger = consoleLogger): Application {
  const store = new MemoryStore({
    onMutation: (event) => logger.log(describeMutation(event)),
    logger,
  });
  const httpServer = new HTTPServer(store, config, logger);

  return { store, httpServer };
}

export async function shutdownApplication(app: Application, logger: Logger = consoleLogger): Promise<void> {
  logger.log('\nShutting down gracefully...');
  await app.httpServer.stop();
  logger.log('Shutdown complete');
}
