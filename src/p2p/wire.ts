import { type Request, createRequest } from '../message/request';
import {
  type Response,
  ContentType,
  ResponseStatus,
  createResponse,
  isContentType,
  isResponseStatus,
} from '../message/response';

/** Request document carried in a frame */
export interface WireRequest {
  path: string;
  query?: Record<string, string>;
  metadata?: Record<string, string>;
  /** base64 */
  body?: string;
}

/** Response document carried in a frame */
export interface WireResponse {
  status: number;
  content_type: string;
  /** base64 */
  body: string;
}

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * Strict base64 decoding: returns null on anything that is not canonical base64.
 */
export function decodeBase64(value: string): Uint8Array | null {
  if (!BASE64_PATTERN.test(value)) {
    return null;
  }
  return Buffer.from(value, 'base64');
}

export function encodeBase64(data: Uint8Array): string {
  return Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString('base64');
}

function parseJsonObject(payload: Uint8Array): Record<string, unknown> | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(new TextDecoder('utf-8', { fatal: true }).decode(payload));
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return null;
  }
  return Object.fromEntries(Object.entries(parsed));
}

/**
 * Read an optional string map. `undefined` when absent, null when malformed.
 */
function parseStringMap(value: unknown): Record<string, string> | undefined | null {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return null;
  }
  const entries: [string, string][] = [];
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry !== 'string') {
      return null;
    }
    entries.push([key, entry]);
  }
  return Object.fromEntries(entries);
}

function encodeJson(document: WireRequest | WireResponse): Uint8Array {
  return Buffer.from(JSON.stringify(document), 'utf-8');
}

/**
 * Encode a request document. Empty query and metadata maps are omitted;
 * an empty body is kept.
 */
export function encodeRequest(request: Request): Uint8Array {
  const document: WireRequest = { path: request.path };
  if (Object.keys(request.queryParams).length > 0) {
    document.query = { ...request.queryParams };
  }
  if (Object.keys(request.metadata).length > 0) {
    document.metadata = { ...request.metadata };
  }
  if (request.body !== undefined) {
    document.body = encodeBase64(request.body);
  }
  return encodeJson(document);
}

/**
 * Decode a request document.
 * @returns null on invalid JSON, a missing path, mistyped fields or invalid base64
 */
export function parseRequest(payload: Uint8Array): Request | null {
  const json = parseJsonObject(payload);
  if (!json || typeof json.path !== 'string') {
    return null;
  }

  const queryParams = parseStringMap(json.query);
  const metadata = parseStringMap(json.metadata);
  if (queryParams === null || metadata === null) {
    return null;
  }

  let body: Uint8Array | undefined;
  if (json.body !== undefined) {
    if (typeof json.body !== 'string') {
      return null;
    }
    const decoded = decodeBase64(json.body);
    if (!decoded) {
      return null;
    }
    body = decoded;
  }

  return createRequest(json.path, { queryParams, metadata, ...(body ? { body } : {}) });
}

export function encodeResponse(response: Response): Uint8Array {
  return encodeJson({
    status: response.status,
    content_type: response.contentType,
    body: encodeBase64(response.body),
  });
}

/**
 * Decode a response document. An unknown status becomes internalError
 * and an unknown content type becomes binary.
 * @returns null on invalid JSON, missing fields or invalid base64
 */
export function parseResponse(payload: Uint8Array): Response | null {
  const json = parseJsonObject(payload);
  if (!json || typeof json.status !== 'number' || typeof json.content_type !== 'string' || typeof json.body !== 'string') {
    return null;
  }
  const body = decodeBase64(json.body);
  if (!body) {
    return null;
  }

  const status = isResponseStatus(json.status) ? json.status : ResponseStatus.internalError;
  const contentType = isContentType(json.content_type) ? json.content_type : ContentType.binary;
  return createResponse(status, contentType, body);
}
