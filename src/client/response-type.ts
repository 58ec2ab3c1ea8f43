import { sortKeys } from '../message/response';

export type ClassifiedResponse =
  | { kind: 'json'; text: string }
  | { kind: 'text'; text: string }
  | { kind: 'binary'; data: Uint8Array };

function decodeUtf8(data: Uint8Array): string | null {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(data);
  } catch {
    return null;
  }
}

/** An object or array, else null */
function parseJsonDocument(text: string): object | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  return typeof parsed === 'object' && parsed !== null ? parsed : null;
}

function isControlCharacter(char: string): boolean {
  const code = char.codePointAt(0) ?? 0;
  return code < 32 && code !== 9 && code !== 10 && code !== 13;
}

/**
 * Decide how to present a response body.
 *
 * A JSON object or array is re-printed with sorted keys. Other UTF-8 counts
 * as text when under 1% of its characters are control characters (tab, LF
 * and CR excepted). Everything else is binary.
 */
export function classifyResponse(data: Uint8Array): ClassifiedResponse {
  const text = decodeUtf8(data);
  if (text === null) {
    return { kind: 'binary', data };
  }

  const parsed = parseJsonDocument(text);
  if (parsed !== null) {
    return { kind: 'json', text: JSON.stringify(sortKeys(parsed), null, 2) };
  }

  const chars = [...text];
  const controlCount = chars.filter(isControlCharacter).length;
  if (chars.length > 0 && controlCount / chars.length < 0.01) {
    return { kind: 'text', text };
  }
  return { kind: 'binary', data };
}

const SIGNATURES: ReadonlyArray<{ ext: string; magic: readonly number[] }> = [
  { ext: 'png', magic: [0x89, 0x50, 0x4e, 0x47] },
  { ext: 'jpg', magic: [0xff, 0xd8, 0xff] },
  { ext: 'gif', magic: [0x47, 0x49, 0x46, 0x38] },
  { ext: 'pdf', magic: [0x25, 0x50, 0x44, 0x46] },
  { ext: 'zip', magic: [0x50, 0x4b, 0x03, 0x04] },
];

/**
 * File extension from magic numbers. Fewer than 8 bytes is always "bin".
 */
export function detectFileExtension(data: Uint8Array): string {
  if (data.byteLength < 8) {
    return 'bin';
  }
  const match = SIGNATURES.find(({ magic }) => magic.every((byte, i) => data[i] === byte));
  return match?.ext ?? 'bin';
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * /tmp/xplorer-<yyyy-MM-dd-HHmmss>.<ext>, in local time
 */
export function generateTimestampFilename(ext: string, date: Date = new Date()): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `/tmp/xplorer-${day}-${time}.${ext}`;
}
