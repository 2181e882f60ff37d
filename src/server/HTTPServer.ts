import express, { Request, Response, NextFunction } from 'express';
import { Server } from 'http';
import { ServerConfig } from '../common/Config';
import { isClientHttpError } from '../common/Errors';
import { Logger, consoleLogger } from '../common/Logger';
import { IKeyValueStore } from '../interfaces/Storage';
import { RequestValidator } from './RequestValidator';
import { DispatchRequest, RouteDispatcher } from './RouteDispatcher';
import { ResponseBuilder, failure, internalError } from './ResponseBuilder';

export class HTTPServer {
  private readonly app: express.Application;
  private readonly dispatcher: RouteDispatcher;
  private readonly responses = new ResponseBuilder();
  private readonly config: ServerConfig;
  private readonly logger: Logger;
  private server: Server | null = null;

  constructor(store: IKeyValueStore, config: ServerConfig, logger: Logger = consoleLogger) {
    this.config = config;
    this.logger = logger;
    this.dispatcher = new RouteDispatcher(store, new RequestValidator(), logger);
    this.app = express();
    this.app.disable('x-powered-by');
    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandling();
  }

  getApp(): express.Application {
    return this.app;
  }

  private setupMiddleware(): void {
    // Keep the body as bytes whatever its declared type; the validator decides.
    this.app.use(express.raw({ type: () => true, limit: this.config.bodyLimit }));
  }

  private setupRoutes(): void {
    this.app.use(this.handleRequest.bind(this));
  }

  private setupErrorHandling(): void {
    this.app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
      if (isClientHttpError(err)) {
        this.responses.send(res, failure(err.status, err.message));
        return;
      }
      this.logger.error('Unhandled error:', err);
      this.responses.send(res, internalError());
    });
  }

  private async handleRequest(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const outcome = await this.dispatcher.dispatch(toDispatchRequest(req));
      this.responses.send(res, outcome);
    } catch (err) {
      next(err);
    }
  }

  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.config.port, this.config.host, () => {
        this.logger.log(`HTTP server listening on http://${this.config.host}:${this.getPort()}`);
        resolve();
      });

      server.on('error', (err: Error) => {
        reject(err);
      });

      this.server = server;
    });
  }

  async stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.server) {
        resolve();
        return;
      }
      this.server.close((err) => {
        if (err) {
          reject(err);
          return;
        }
        this.server = null;
        this.logger.log('HTTP server stopped');
        resolve();
      });
    });
  }

  /** Bound port, which differs from the configured one when that was 0. */
  getPort(): number {
    const address = this.server?.address();
    if (address && typeof address === 'object') {
      return address.port;
    }
    return this.config.port;
  }
}

function toDispatchRequest(req: Request): DispatchRequest {
  const queryStart = req.originalUrl.indexOf('?');
  const query = new URLSearchParams(queryStart === -1 ? '' : req.originalUrl.slice(queryStart + 1));

  return {
    method: req.method,
    path: req.path,
    query,
    headers: req.headers,
    body: Buffer.isBuffer(req.body) ? req.body : undefined,
  };
}
