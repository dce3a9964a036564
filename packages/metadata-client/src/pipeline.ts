import type {StructuredLogger} from '@xrdinfo/logging';
import {sendHttpRequest, type HttpMethod, type HttpRequestImpl, type HttpResponse, type TlsOptions} from '@xrdinfo/transport';

import {err, fromTransportError, type MetadataResult} from './errors';

/** A built request together with the parser for its response. */
export type PreparedCall<T> = {
  url: string;
  method: HttpMethod;
  headers: Record<string, string>;
  body?: string;
  parse: (response: HttpResponse) => MetadataResult<T>;
};

const COMPONENT = 'metadata.client';

/**
 * Sends one prepared call and parses its response. An unreadable body that came with an
 * HTTP error status is reported as a connection problem rather than a format one.
 */
export const sendPreparedCall = async <T>({
  call,
  operation,
  timeoutMs,
  tls,
  requestImpl,
  logger
}: {
  call: PreparedCall<T>;
  operation: string;
  timeoutMs: number;
  tls: TlsOptions | undefined;
  requestImpl: HttpRequestImpl | undefined;
  logger: StructuredLogger;
}): Promise<MetadataResult<T>> => {
  const startedAt = Date.now();
  const response = await (requestImpl ?? sendHttpRequest)({
    url: call.url,
    method: call.method,
    headers: call.headers,
    timeoutMs,
    ...(call.body !== undefined ? {body: call.body} : {}),
    ...(tls ? {tls} : {})
  });

  if (!response.ok) {
    const failure = fromTransportError(response.error);
    logger.warn({
      event: 'metadata.request.failed',
      component: COMPONENT,
      operation,
      source_url: call.url,
      reason_code: failure.error.code,
      duration_ms: Date.now() - startedAt,
      message: failure.error.message || undefined
    });
    return failure;
  }

  const {status} = response.value;
  const parsed = call.parse(response.value);
  const result: MetadataResult<T> =
    !parsed.ok && parsed.error.code === 'format_error' && status >= 400
      ? err('connection_error', `HTTP ${status} from ${call.url}`)
      : parsed;

  if (result.ok) {
    logger.info({
      event: 'metadata.request.completed',
      component: COMPONENT,
      operation,
      source_url: call.url,
      status_code: status,
      duration_ms: Date.now() - startedAt
    });
  } else {
    logger.warn({
      event: 'metadata.request.failed',
      component: COMPONENT,
      operation,
      source_url: call.url,
      status_code: status,
      reason_code: result.error.code,
      duration_ms: Date.now() - startedAt,
      message: result.error.message || undefined
    });
  }

  return result;
};
