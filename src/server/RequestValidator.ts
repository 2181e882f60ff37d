import { IncomingHttpHeaders } from 'http';
import { JsonObject, isJsonObject } from '../common/Types';

export const JSON_CONTENT_TYPES: readonly string[] = ['application/json'];
const ANY_MEDIA_TYPE = '*/*';

export const INVALID_JSON_REQUEST_MESSAGE =
  'Request should accept JSON and its body should be a JSON object; a length header must also be specified.';

export interface RawJsonRequest {
  readonly headers: IncomingHttpHeaders;
  /** Bytes read by the transport; undefined when no body was read. */
  readonly body: Buffer | undefined;
}

export type ValidationResult =
  | { readonly accepted: true; readonly payload: JsonObject }
  | { readonly accepted: false; readonly error: string };

/**
 * Decides whether a mutating request carries a usable JSON object.
 *
 * Request shape (length header, Accept, Content-Type) is a hard check. Body
 * parsing is soft: malformed JSON, `null` and non-object values all become
 * `{}` so the required-field check reports what is missing.
 */
export class RequestValidator {
  private readonly decoder = new TextDecoder('utf-8', { fatal: true });

  validate(request: RawJsonRequest, expectedParams: string | readonly string[]): ValidationResult {
    const { headers } = request;
    const hasLength = headers['content-length'] !== undefined;
    const text = this.decodeBody(request.body);

    if (!hasLength || !acceptsJson(headers.accept) || !isJsonContentType(headers['content-type'])) {
      return { accepted: false, error: INVALID_JSON_REQUEST_MESSAGE };
    }

    const payload = parseJsonObject(text);
    const expected = typeof expectedParams === 'string' ? [expectedParams] : [...expectedParams];
    const missing = expected.filter((param) => !Object.prototype.hasOwnProperty.call(payload, param));

    if (missing.length > 0) {
      return {
        accepted: false,
        error: `Request is missing parameters. Expected: ${JSON.stringify(expected)}, Found: ${JSON.stringify(Object.keys(payload))}`,
      };
    }

    return { accepted: true, payload };
  }

  private decodeBody(body: Buffer | undefined): string {
    if (!body) {
      return '';
    }
    try {
      return this.decoder.decode(body);
    } catch {
      // invalid UTF-8 reads as an empty body
      return '';
    }
  }
}

/**
 * True when the client states no preference, or lists a JSON type or the wildcard.
 * Media-type parameters such as `q=` are ignored.
 */
export function acceptsJson(accept: string | undefined): boolean {
  if (accept === undefined || accept.trim().length === 0) {
    return true;
  }

  const mediaTypes = accept
    .split(',')
    .map((entry) => (entry.split(';')[0] ?? '').trim().toLowerCase());

  return mediaTypes.some((type) => type === ANY_MEDIA_TYPE || JSON_CONTENT_TYPES.includes(type));
}

/** Substring match, so `application/json; charset=utf-8` qualifies. */
export function isJsonContentType(contentType: string | undefined): boolean {
  if (!contentType) {
    return false;
  }
  const normalized = contentType.toLowerCase();
  return JSON_CONTENT_TYPES.some((jsonType) => normalized.includes(jsonType));
}

export function parseJsonObject(text: string): JsonObject {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return {};
  }
  return isJsonObject(parsed) ? parsed : {};
}
