import { Logger, consoleLogger } from '../common/Logger';
import { IKeyValueStore } from '../interfaces/Storage';
import { RawJsonRequest, RequestValidator } from './RequestValidator';
import { HttpStatus, OperationOutcome, failure, internalError, ok } from './ResponseBuilder';

export enum Route {
  GET = 'get',
  SET = 'set',
  DELETE = 'delete',
}

const ROUTE_PREFIXES: ReadonlyArray<readonly [string, Route]> = [
  ['/get', Route.GET],
  ['/set', Route.SET],
  ['/delete', Route.DELETE],
];

export const INVALID_KEY_MESSAGE = 'Invalid key: must be a string';

export interface DispatchRequest extends RawJsonRequest {
  readonly method: string;
  /** Request path without the query string. */
  readonly path: string;
  readonly query: URLSearchParams;
}

/** Prefix match: `/get`, `/get/` and `/getter` all select the get route. */
export function resolveRoute(path: string): Route | undefined {
  const match = ROUTE_PREFIXES.find(([prefix]) => path.startsWith(prefix));
  return match?.[1];
}

export class RouteDispatcher {
  private readonly store: IKeyValueStore;
  private readonly validator: RequestValidator;
  private readonly logger: Logger;

  constructor(store: IKeyValueStore, validator: RequestValidator = new RequestValidator(), logger: Logger = consoleLogger) {
    this.store = store;
    this.validator = validator;
    this.logger = logger;
  }

  /**
   * Map one request to its outcome. Never rejects: unexpected faults are
   * logged and answered with a generic 500.
   */
  async dispatch(request: DispatchRequest): Promise<OperationOutcome> {
    try {
      return await this.route(request);
    } catch (err) {
      this.logger.error('Unhandled error:', err);
      return internalError();
    }
  }

  private async route(request: DispatchRequest): Promise<OperationOutcome> {
    const route = resolveRoute(request.path);
    const method = request.method.toUpperCase();

    if (route === undefined) {
      return failure(HttpStatus.NOT_FOUND, `invalid path \`${request.path}\`. Unavailable resource`);
    }

    if (method === 'GET') {
      if (route === Route.GET) {
        return this.handleGet(request.query);
      }
      return failure(HttpStatus.METHOD_NOT_ALLOWED, 'Method Not Allowed. Using GET instead of POST');
    }

    if (method === 'POST') {
      switch (route) {
        case Route.SET: return this.handleSet(request);
        case Route.DELETE: return this.handleDelete(request);
        case Route.GET: return failure(HttpStatus.METHOD_NOT_ALLOWED, 'Method Not Allowed. Using POST instead of GET');
      }
    }

    return failure(HttpStatus.METHOD_NOT_ALLOWED, `Method Not Allowed. ${method} is not supported`);
  }

  private async handleGet(query: URLSearchParams): Promise<OperationOutcome> {
    const key = query.get('key');

    if (!key) {
      return failure(HttpStatus.BAD_REQUEST, 'Missing key parameter');
    }

    const result = await this.store.get(key);

    if (!result.found) {
      return failure(HttpStatus.NOT_FOUND, `Key \`${key}\` does not exist in the database`);
    }

    return ok({ key, value: result.value });
  }

  private async handleSet(request: RawJsonRequest): Promise<OperationOutcome> {
    const validation = this.validator.validate(request, ['key', 'value']);

    if (!validation.accepted) {
      return failure(HttpStatus.BAD_REQUEST, validation.error);
    }

    const { key, value } = validation.payload;

    if (typeof key !== 'string') {
      return failure(HttpStatus.BAD_REQUEST, INVALID_KEY_MESSAGE);
    }
    // hasOwnProperty passed in the validator, so value is defined
    const submitted = value ?? null;

    await this.store.set(key, submitted);
    return ok({ key, value: submitted });
  }

  private async handleDelete(request: RawJsonRequest): Promise<OperationOutcome> {
    const validation = this.validator.validate(request, 'key');

    if (!validation.accepted) {
      return failure(HttpStatus.BAD_REQUEST, validation.error);
    }

    const { key } = validation.payload;

    if (typeof key !== 'string') {
      return failure(HttpStatus.BAD_REQUEST, INVALID_KEY_MESSAGE);
    }

    const removed = await this.store.delete(key);

    if (!removed.found) {
      return ok({ message: `Key \`${key}\` does not exist` });
    }

    return ok({ key, value: removed.value });
  }
}
