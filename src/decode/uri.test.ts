import * as assert from 'node:assert';
import { describe, test } from 'node:test';

import { HttpUrlParseError } from '../errors.js';
import { parseHttpRequestTarget } from './uri.js';

describe('parseHttpRequestTarget', () => {
  test('should parse origin form', () => {
    assert.deepStrictEqual(parseHttpRequestTarget('/a/b?x=1&y=2', 'strict'), {
      form: 'origin',
      scheme: null,
      host: null,
      port: null,
      path: '/a/b',
      query: 'x=1&y=2',
      raw: '/a/b?x=1&y=2',
    });
  });

  test('should keep an empty query distinct from none', () => {
    assert.strictEqual(parseHttpRequestTarget('/a?', 'strict').query, '');
    assert.strictEqual(parseHttpRequestTarget('/a', 'strict').query, null);
  });

  test('should parse absolute form', () => {
    assert.deepStrictEqual(parseHttpRequestTarget('HTTP://Example.COM:8080/p?q', 'strict'), {
      form: 'absolute',
      scheme: 'http',
      host: 'example.com',
      port: 8080,
      path: '/p',
      query: 'q',
      raw: 'HTTP://Example.COM:8080/p?q',
    });
  });

  test('should default the absolute path to a slash', () => {
    const target = parseHttpRequestTarget('http://example.com', 'strict');

    assert.strictEqual(target.path, '/');
    assert.strictEqual(target.port, null);
  });

  test('should parse authority form', () => {
    const target = parseHttpRequestTarget('example.com:443', 'strict');

    assert.strictEqual(target.form, 'authority');
    assert.strictEqual(target.host, 'example.com');
    assert.strictEqual(target.port, 443);
    assert.strictEqual(target.path, '');
  });

  test('should parse an IP literal authority', () => {
    const target = parseHttpRequestTarget('[::1]:8080', 'strict');

    assert.strictEqual(target.host, '[::1]');
    assert.strictEqual(target.port, 8080);
  });

  test('should parse asterisk form', () => {
    const target = parseHttpRequestTarget('*', 'strict');

    assert.strictEqual(target.form, 'asterisk');
    assert.strictEqual(target.path, '*');
  });

  test('should accept percent-encoding', () => {
    assert.strictEqual(parseHttpRequestTarget('/a%20b', 'strict').path, '/a%20b');
  });

  test('should reject malformed targets', () => {
    const cases = [
      '',
      '/a#frag',
      '/a%2',
      '/a%zz',
      '/a b',
      '/a"b',
      'example.com',
      'example.com:99999',
      'example.com:port',
      'http://user@example.com/',
      'http:///path',
      '[::1',
    ];
    for (const raw of cases) {
      assert.throws(() => parseHttpRequestTarget(raw, 'strict'), HttpUrlParseError, raw);
    }
  });

  test('should relax the query character set', () => {
    assert.throws(() => parseHttpRequestTarget('/search?q={x}', 'strict'), HttpUrlParseError);

    const target = parseHttpRequestTarget('/search?q={x}', 'relaxed');
    assert.strictEqual(target.query, 'q={x}');
  });

  test('should keep the path strict in relaxed mode', () => {
    assert.throws(() => parseHttpRequestTarget('/{x}', 'relaxed'), HttpUrlParseError);
  });
});
