/**
 * Response status codes. Values double as HTTP status codes.
 */
export const ResponseStatus = {
  ok: 200,
  badRequest: 400,
  notFound: 404,
  internalError: 500,
} as const;

export type ResponseStatus = (typeof ResponseStatus)[keyof typeof ResponseStatus];

/**
 * Content types a response body can carry.
 */
export const ContentType = {
  json: 'application/json',
  html: 'text/html',
  text: 'text/plain',
  png: 'image/png',
  jpeg: 'image/jpeg',
  binary: 'application/octet-stream',
} as const;

export type ContentType = (typeof ContentType)[keyof typeof ContentType];

/**
 * A transport-agnostic response. Frozen once constructed.
 */
export interface Response {
  readonly status: ResponseStatus;
  readonly contentType: ContentType;
  readonly body: Uint8Array;
}

const STATUS_VALUES: readonly number[] = Object.values(ResponseStatus);
const CONTENT_TYPE_VALUES: readonly string[] = Object.values(ContentType);

export function isResponseStatus(value: number): value is ResponseStatus {
  return STATUS_VALUES.includes(value);
}

export function isContentType(value: string): value is ContentType {
  return CONTENT_TYPE_VALUES.includes(value);
}

export function createResponse(status: ResponseStatus, contentType: ContentType, body: Uint8Array): Response {
  return Object.freeze({ status, contentType, body });
}

/**
 * Recursively rebuild plain objects with their keys sorted, so JSON output is stable.
 */
export function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value !== null && typeof value === 'object' && !(value instanceof Date)) {
    const sorted: Record<string, unknown> = {};
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [key, entry] of entries) {
      sorted[key] = sortKeys(entry);
    }
    return sorted;
  }
  return value;
}

/**
 * JSON response, pretty-printed with sorted keys.
 * Values JSON cannot represent (e.g. a bare `undefined`) encode as "{}".
 */
export function jsonResponse(value: unknown, status: ResponseStatus = ResponseStatus.ok): Response {
  let text: string | undefined;
  try {
    text = JSON.stringify(sortKeys(value), null, 2);
  } catch {
    text = undefined;
  }
  return createResponse(status, ContentType.json, Buffer.from(text ?? '{}', 'utf-8'));
}

export function textResponse(text: string, status: ResponseStatus = ResponseStatus.ok): Response {
  return createResponse(status, ContentType.text, Buffer.from(text, 'utf-8'));
}

export function htmlResponse(html: string, status: ResponseStatus = ResponseStatus.ok): Response {
  return createResponse(status, ContentType.html, Buffer.from(html, 'utf-8'));
}

export function pngResponse(data: Uint8Array, status: ResponseStatus = ResponseStatus.ok): Response {
  return createResponse(status, ContentType.png, data);
}

export function jpegResponse(data: Uint8Array, status: ResponseStatus = ResponseStatus.ok): Response {
  return createResponse(status, ContentType.jpeg, data);
}

export function binaryResponse(data: Uint8Array, status: ResponseStatus = ResponseStatus.ok): Response {
  return createResponse(status, ContentType.binary, data);
}

/** `{"error": message}` with status 404 */
export function notFoundResponse(message = 'Not Found'): Response {
  return jsonResponse({ error: message }, ResponseStatus.notFound);
}

/** `{"error": message}`, status 500 unless given */
export function errorResponse(message: string, status: ResponseStatus = ResponseStatus.internalError): Response {
  return jsonResponse({ error: message }, status);
}

/**
 * Decode a response body as UTF-8 text.
 */
export function bodyText(response: Pick<Response, 'body'>): string {
  return new TextDecoder().decode(response.body);
}
