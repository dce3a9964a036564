import * as http from 'node:http';
import * as https from 'node:https';

import {HttpRequestSchema, type HttpRequest, type HttpResponse} from './contracts';
import {err, ok, type TransportResult} from './errors';

export type HttpRequestImpl = (request: HttpRequest) => Promise<TransportResult<HttpResponse>>;

const TLS_ERROR_CODES = new Set([
  'EPROTO',
  'CERT_HAS_EXPIRED',
  'CERT_NOT_YET_VALID',
  'CERT_UNTRUSTED',
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'UNABLE_TO_GET_ISSUER_CERT',
  'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'ERR_TLS_CERT_ALTNAME_INVALID'
]);

const readErrorCode = (error: Error): string | undefined =>
  'code' in error && typeof error.code === 'string' ? error.code : undefined;

class ResponseTooLargeError extends Error {
  constructor(limit: number) {
    super(`Response body exceeds ${limit} bytes`);
    this.name = 'ResponseTooLargeError';
  }
}

export const mapRequestError = (unknownError: unknown): TransportResult<never> => {
  if (unknownError instanceof ResponseTooLargeError) {
    return err('response_too_large', unknownError.message);
  }

  if (unknownError instanceof Error) {
    if (unknownError.name === 'AbortError' || unknownError.name === 'TimeoutError') {
      return err('timeout_error', 'Request timed out');
    }

    const code = readErrorCode(unknownError);
    if (code && (TLS_ERROR_CODES.has(code) || code.startsWith('ERR_SSL_') || code.startsWith('ERR_TLS_'))) {
      return err('tls_error', unknownError.message);
    }

    return err('network_error', code ? `${code}: ${unknownError.message}` : unknownError.message);
  }

  return err('network_error', 'Request failed');
};

const flattenHeaders = (headers: http.IncomingHttpHeaders): Record<string, string> => {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    result[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
  }

  return result;
};

type HttpsOptions = Pick<https.RequestOptions, 'cert' | 'key' | 'ca' | 'rejectUnauthorized'>;

const performRequest = ({
  url,
  method,
  headers,
  body,
  timeoutMs,
  maxResponseBytes,
  tls
}: {
  url: URL;
  method: string;
  headers: Record<string, string>;
  body: string | Buffer | undefined;
  timeoutMs: number;
  maxResponseBytes: number;
  tls: HttpsOptions | undefined;
}): Promise<HttpResponse> =>
  new Promise((resolve, reject) => {
    const isHttps = url.protocol === 'https:';
    const signal = AbortSignal.timeout(timeoutMs);
    const fail = (error: unknown) => reject(signal.aborted ? signal.reason : error);
    const requestOptions: https.RequestOptions = {
      hostname: url.hostname,
      port: url.port || (isHttps ? 443 : 80),
      path: url.pathname + url.search,
      method,
      headers: body === undefined ? headers : {...headers, 'content-length': String(Buffer.byteLength(body))},
      signal,
      ...(isHttps && tls ? tls : {})
    };

    const onResponse = (res: http.IncomingMessage) => {
      const chunks: Buffer[] = [];
      let received = 0;

      res.on('data', (chunk: Buffer) => {
        received += chunk.length;
        if (received > maxResponseBytes) {
          res.destroy(new ResponseTooLargeError(maxResponseBytes));
          return;
        }

        chunks.push(chunk);
      });
      res.on('error', fail);
      res.on('end', () => {
        resolve({
          status: res.statusCode ?? 0,
          headers: flattenHeaders(res.headers),
          body: Buffer.concat(chunks)
        });
      });
    };

    const req = isHttps ? https.request(requestOptions, onResponse) : http.request(requestOptions, onResponse);
    req.on('error', fail);

    if (body !== undefined) {
      req.write(body);
    }

    req.end();
  });

const toHttpsOptions = (tls: HttpRequest['tls']): HttpsOptions | undefined => {
  if (!tls) {
    return undefined;
  }

  return {
    ...(tls.cert && tls.key ? {cert: tls.cert, key: tls.key} : {}),
    ...(tls.ca ? {ca: tls.ca} : {}),
    ...(tls.rejectUnauthorized !== undefined ? {rejectUnauthorized: tls.rejectUnauthorized} : {})
  };
};

export const sendHttpRequest: HttpRequestImpl = async request => {
  const parsed = HttpRequestSchema.safeParse(request);
  if (!parsed.success) {
    return err('invalid_input', parsed.error.message);
  }

  let url: URL;
  try {
    url = new URL(parsed.data.url);
  } catch {
    return err('invalid_url', `Invalid URL: ${parsed.data.url}`);
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return err('invalid_url', `Unsupported URL scheme: ${url.protocol}`);
  }

  try {
    const response = await performRequest({
      url,
      method: parsed.data.method,
      headers: parsed.data.headers,
      body: parsed.data.body,
      timeoutMs: parsed.data.timeoutMs,
      maxResponseBytes: parsed.data.maxResponseBytes,
      tls: toHttpsOptions(parsed.data.tls)
    });
    return ok(response);
  } catch (unknownError) {
    return mapRequestError(unknownError);
  }
};
