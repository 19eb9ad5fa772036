/**
 * Request service domain codec tests
 */

import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { decodeValue, encodeValue, string } from '@/ipc/codec/index.js';
import {
  cacheLevel,
  getHeader,
  headerMap,
  networkError,
  selectedFile,
  url,
} from '@/services/request/index.js';

void describe('getHeader', () => {
  const headers = [
    { name: 'Set-Cookie', value: 'a=1' },
    { name: 'content-type', value: 'text/html' },
    { name: 'Set-Cookie', value: 'b=2' },
  ];

  void it('matches names case-insensitively', () => {
    assert.equal(getHeader(headers, 'Content-Type'), 'text/html');
  });

  void it('returns the first of repeated headers', () => {
    assert.equal(getHeader(headers, 'set-cookie'), 'a=1');
  });

  void it('returns undefined for an absent header', () => {
    assert.equal(getHeader(headers, 'Location'), undefined);
  });
});

void describe('url codec', () => {
  void it('travels as its serialized form', () => {
    const frame = encodeValue(url, new URL('file:///docs/a b.txt'));

    assert.equal(decodeValue(string, frame), 'file:///docs/a%20b.txt');
    assert.equal(decodeValue(url, frame).pathname, '/docs/a%20b.txt');
  });

  void it('rejects a string that does not parse', () => {
    assert.throws(() => decodeValue(url, encodeValue(string, 'not a url')), {
      name: 'DecodeError',
      message: 'Invalid URL: not a url',
    });
  });
});

void describe('header map codec', () => {
  void it('keeps order and repeated names', () => {
    const headers = [
      { name: 'Set-Cookie', value: 'a=1' },
      { name: 'Set-Cookie', value: 'b=2' },
    ];

    assert.deepEqual(decodeValue(headerMap, encodeValue(headerMap, headers)), headers);
  });
});

void describe('enumerations', () => {
  void it('encode members by declaration index', () => {
    assert.deepEqual([...encodeValue(networkError, 'UnableToResolveHost').bytes], [0]);
    assert.deepEqual([...encodeValue(networkError, 'Unknown').bytes], [9]);
    assert.deepEqual([...encodeValue(cacheLevel, 'CreateConnection').bytes], [1]);
  });

  void it('reject an index past the last member', () => {
    assert.throws(() => decodeValue(cacheLevel, { bytes: Uint8Array.from([2]), files: [] }), {
      name: 'DecodeError',
      message: 'Unknown enumeration index 2',
    });
  });
});

void describe('selected file codec', () => {
  void it('carries inline contents without descriptors', () => {
    const frame = encodeValue(selectedFile, {
      name: 'a.txt',
      fileOrContents: { kind: 'contents', value: Uint8Array.from([1, 2]) },
    });

    assert.deepEqual(frame.files, []);
    const decoded = decodeValue(selectedFile, frame);
    assert.equal(decoded.name, 'a.txt');
    assert.equal(decoded.fileOrContents.kind, 'contents');
    assert.deepEqual(
      decoded.fileOrContents.kind === 'contents' ? [...decoded.fileOrContents.value] : [],
      [1, 2]
    );
  });
});
