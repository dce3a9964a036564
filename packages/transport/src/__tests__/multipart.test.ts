import {describe, expect, it} from 'vitest';

import {
  addUrlScheme,
  boundaryFromBody,
  boundaryFromContentType,
  parseHeaderBlock,
  parseHeaderValue,
  resolveUrl,
  splitMultipart,
  splitMultipartBody
} from '../index';

const crlfBody = Buffer.from(
  [
    'preamble',
    '--b1',
    'Content-Type: text/plain',
    '',
    'hello',
    '--b1',
    'X-Value: 1',
    '',
    'world',
    '--b1--',
    ''
  ].join('\r\n'),
  'latin1'
);

describe('parseHeaderValue', () => {
  it('splits the value from quoted and bare parameters', () => {
    expect(parseHeaderValue('multipart/related; boundary="a;b"; Type=text/xml')).toEqual({
      value: 'multipart/related',
      params: {boundary: 'a;b', type: 'text/xml'}
    });
  });

  it('unescapes quoted characters', () => {
    expect(parseHeaderValue('SHARED-PARAMETERS; instance="E\\"E"').params.instance).toBe('E"E');
  });
});

describe('boundary discovery', () => {
  it('reads the boundary from a multipart content type', () => {
    expect(boundaryFromContentType('multipart/mixed; boundary=jetty771207119h3h10dty')).toBe('jetty771207119h3h10dty');
    expect(boundaryFromContentType('text/xml; boundary=nope')).toBeUndefined();
    expect(boundaryFromContentType(undefined)).toBeUndefined();
  });

  it('falls back to the first delimiter line of the body', () => {
    expect(boundaryFromBody(Buffer.from('\n--xroad123\nA: b\n'))).toBe('xroad123');
    expect(boundaryFromBody(Buffer.from('Content-Type: text/plain\n'))).toBeUndefined();
  });
});

describe('parseHeaderBlock', () => {
  it('lower-cases names and joins folded lines', () => {
    expect(parseHeaderBlock('Content-Type: text/plain\r\nX-Long: first\r\n  second')).toEqual({
      'content-type': 'text/plain',
      'x-long': 'first second'
    });
  });
});

describe('splitMultipart', () => {
  it('splits CRLF bodies and keeps raw part bytes', () => {
    const result = splitMultipart({body: crlfBody, boundary: 'b1'});

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toHaveLength(2);
    expect(result.value[0]?.headers).toEqual({'content-type': 'text/plain'});
    expect(result.value[0]?.body.toString('latin1')).toBe('hello');
    expect(result.value[0]?.raw.toString('latin1')).toBe('Content-Type: text/plain\r\n\r\nhello');
    expect(result.value[1]?.headers).toEqual({'x-value': '1'});
    expect(result.value[1]?.body.toString('latin1')).toBe('world');
  });

  it('accepts bare LF line breaks', () => {
    const body = Buffer.from('--b2\nA: 1\n\nfirst\nline\n--b2\n\nno headers\n--b2--\n', 'latin1');

    const result = splitMultipart({body, boundary: 'b2'});

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.map(part => part.body.toString('latin1'))).toEqual(['first\nline', 'no headers']);
    expect(result.value[1]?.headers).toEqual({});
  });

  it('ignores the boundary text when it is not at the start of a line', () => {
    const body = Buffer.from('--b3\r\n\r\nvalue --b3 inline\r\n--b3--', 'latin1');

    const result = splitMultipart({body, boundary: 'b3'});

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value[0]?.body.toString('latin1')).toBe('value --b3 inline');
  });

  it('fails when the closing delimiter is missing', () => {
    const result = splitMultipart({body: Buffer.from('--b4\r\n\r\nbody\r\n'), boundary: 'b4'});

    expect(result).toEqual({ok: false, error: {code: 'format_error', message: 'Multipart body has no closing delimiter'}});
  });

  it('fails when the boundary never appears', () => {
    const result = splitMultipart({body: Buffer.from('plain text'), boundary: 'b5'});

    expect(result.ok).toBe(false);
  });

  it('needs a boundary from the header or the body', () => {
    const result = splitMultipartBody({body: Buffer.from('<xml/>'), contentType: 'text/xml'});

    expect(result).toEqual({ok: false, error: {code: 'format_error', message: 'Multipart boundary is missing'}});
  });

  it('prefers the content-type boundary', () => {
    const result = splitMultipartBody({body: crlfBody, contentType: 'multipart/related; boundary="b1"'});

    expect(result.ok ? result.value.length : -1).toBe(2);
  });
});

describe('url helpers', () => {
  it('adds a scheme only where one is missing', () => {
    expect(addUrlScheme({address: 'ss1.example.test', secure: false})).toBe('http://ss1.example.test');
    expect(addUrlScheme({address: 'ss1.example.test:8443', secure: true})).toBe('https://ss1.example.test:8443');
    expect(addUrlScheme({address: 'http://ss1.example.test', secure: true})).toBe('http://ss1.example.test');
  });

  it('resolves content locations against the directory URL', () => {
    expect(resolveUrl({base: 'http://cs.example.test/internalconf', location: '/V2/20260101/shared-params.xml'})).toBe(
      'http://cs.example.test/V2/20260101/shared-params.xml'
    );
    expect(resolveUrl({base: 'http://cs.example.test/conf/internalconf', location: 'shared.xml'})).toBe(
      'http://cs.example.test/conf/shared.xml'
    );
    expect(resolveUrl({base: 'not a url', location: 'shared.xml'})).toBeUndefined();
  });
});
