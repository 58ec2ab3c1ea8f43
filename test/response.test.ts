import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  ContentType,
  ResponseStatus,
  binaryResponse,
  bodyText,
  errorResponse,
  htmlResponse,
  isContentType,
  isResponseStatus,
  jpegResponse,
  jsonResponse,
  notFoundResponse,
  pngResponse,
  textResponse,
} from '../src/message/response.js';

describe('Response', () => {
  it('should pretty-print JSON with sorted keys', () => {
    const response = jsonResponse({ b: 1, a: { d: 2, c: [3, { z: true, y: null }] } });
    assert.strictEqual(response.status, 200);
    assert.strictEqual(response.contentType, 'application/json');
    assert.strictEqual(
      bodyText(response),
      [
        '{',
        '  "a": {',
        '    "c": [',
        '      3,',
        '      {',
        '        "y": null,',
        '        "z": true',
        '      }',
        '    ],',
        '    "d": 2',
        '  },',
        '  "b": 1',
        '}',
      ].join('\n')
    );
  });

  it('should encode values JSON cannot represent as an empty object', () => {
    assert.strictEqual(bodyText(jsonResponse(undefined)), '{}');
  });

  it('should carry the given status', () => {
    assert.strictEqual(jsonResponse([], ResponseStatus.badRequest).status, 400);
    assert.strictEqual(textResponse('nope', ResponseStatus.notFound).status, 404);
  });

  it('should build text and html responses', () => {
    const text = textResponse('Kyle');
    assert.strictEqual(text.contentType, ContentType.text);
    assert.strictEqual(bodyText(text), 'Kyle');

    const html = htmlResponse('<p>hi</p>');
    assert.strictEqual(html.contentType, 'text/html');
    assert.strictEqual(bodyText(html), '<p>hi</p>');
  });

  it('should pass binary bodies through', () => {
    const data = new Uint8Array([0x89, 0x50, 0x4e, 0x47]);
    assert.strictEqual(pngResponse(data).contentType, 'image/png');
    assert.strictEqual(jpegResponse(data).contentType, 'image/jpeg');
    const binary = binaryResponse(data);
    assert.strictEqual(binary.contentType, 'application/octet-stream');
    assert.strictEqual(binary.body, data);
  });

  it('should build not-found responses', () => {
    const response = notFoundResponse();
    assert.strictEqual(response.status, 404);
    assert.strictEqual(response.contentType, 'application/json');
    assert.deepStrictEqual(JSON.parse(bodyText(response)), { error: 'Not Found' });
    assert.deepStrictEqual(JSON.parse(bodyText(notFoundResponse('No such file'))), { error: 'No such file' });
  });

  it('should build error responses', () => {
    const response = errorResponse('boom');
    assert.strictEqual(response.status, 500);
    assert.strictEqual(bodyText(response), '{\n  "error": "boom"\n}');
    assert.strictEqual(errorResponse('bad input', ResponseStatus.badRequest).status, 400);
  });

  it('should be frozen', () => {
    assert.ok(Object.isFrozen(textResponse('x')));
  });

  it('should recognize known statuses and content types', () => {
    assert.strictEqual(isResponseStatus(200), true);
    assert.strictEqual(isResponseStatus(201), false);
    assert.strictEqual(isContentType('image/jpeg'), true);
    assert.strictEqual(isContentType('text/csv'), false);
  });
});
