import { Response } from 'express';
import { JsonObject } from '../common/Types';

export enum HttpStatus {
  OK = 200,
  BAD_REQUEST = 400,
  NOT_FOUND = 404,
  METHOD_NOT_ALLOWED = 405,
  INTERNAL_SERVER_ERROR = 500,
}

export interface OperationOutcome {
  readonly status: number;
  readonly body: JsonObject;
}

export const INTERNAL_ERROR_MESSAGE = 'Internal Server Error';

export function ok(body: JsonObject): OperationOutcome {
  return { status: HttpStatus.OK, body };
}

export function failure(status: number, error: string): OperationOutcome {
  return { status, body: { error } };
}

export function internalError(): OperationOutcome {
  return failure(HttpStatus.INTERNAL_SERVER_ERROR, INTERNAL_ERROR_MESSAGE);
}

export class ResponseBuilder {
  /**
   * Write status, `Content-Type: application/json` and the serialized body in one go.
   * Does nothing if the response has already started.
   */
  send(res: Response, outcome: OperationOutcome): void {
    if (res.headersSent) {
      return;
    }
    res
      .status(outcome.status)
      .type('application/json')
      .send(JSON.stringify(outcome.body));
  }
}
