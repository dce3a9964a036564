import {createNoopLogger, type StructuredLogger} from '@xrdinfo/logging';
import {
  DEFAULT_TIMEOUT_MS,
  resolveUrl,
  sendHttpRequest,
  type HttpRequestImpl,
  type HttpResponse,
  type TlsOptions,
  type TransportError,
  type TransportResult
} from '@xrdinfo/transport';

import type {ConfigurationAnchor, ConfigurationDirectory, ConfigurationPart} from './contracts';
import {err, ok, type GlobalconfResult} from './errors';

export type FetchOptions = {
  tls?: TlsOptions;
  timeoutMs?: number;
  logger?: StructuredLogger;
  requestImpl?: HttpRequestImpl;
};

export type FetchedDirectory = {
  sourceUrl: string;
  body: Buffer;
  contentType?: string;
};

const COMPONENT = 'globalconf.fetcher';

const isSuccessStatus = (status: number) => status >= 200 && status < 300;

export const download = async ({
  url,
  options
}: {
  url: string;
  options: FetchOptions;
}): Promise<TransportResult<HttpResponse>> => {
  const response = await (options.requestImpl ?? sendHttpRequest)({
    url,
    method: 'GET',
    timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    ...(options.tls ? {tls: options.tls} : {})
  });
  if (!response.ok) {
    return response;
  }

  if (!isSuccessStatus(response.value.status)) {
    return {ok: false, error: {code: 'network_error', message: `HTTP ${response.value.status} from ${url}`}};
  }

  return response;
};

/**
 * Downloads the configuration directory from the first anchor source that answers. Sources
 * are tried once each, in anchor order.
 */
export const fetchConfigurationDirectory = async ({
  anchor,
  ...options
}: FetchOptions & {anchor: ConfigurationAnchor}): Promise<GlobalconfResult<FetchedDirectory>> => {
  const logger = options.logger ?? createNoopLogger();
  const failures: TransportError[] = [];

  for (const source of anchor.sources) {
    const startedAt = Date.now();
    const response = await download({url: source.downloadUrl, options});
    if (response.ok) {
      logger.info({
        event: 'globalconf.directory.fetched',
        component: COMPONENT,
        instance: anchor.instanceIdentifier,
        source_url: source.downloadUrl,
        status_code: response.value.status,
        duration_ms: Date.now() - startedAt
      });
      return ok({
        sourceUrl: source.downloadUrl,
        body: response.value.body,
        ...(response.value.headers['content-type'] ? {contentType: response.value.headers['content-type']} : {})
      });
    }

    failures.push(response.error);
    logger.warn({
      event: 'globalconf.source.failed',
      component: COMPONENT,
      instance: anchor.instanceIdentifier,
      source_url: source.downloadUrl,
      reason_code: response.error.code,
      message: response.error.message || undefined
    });
  }

  const summary = failures.map(failure => failure.message).join('; ');
  if (failures.every(failure => failure.code === 'timeout_error')) {
    return err('timeout_error', `All configuration sources timed out: ${summary}`);
  }

  return err('network_error', `No configuration source could be reached: ${summary}`);
};

/**
 * Downloads every part the directory lists from the source that served the directory. The
 * first failing download aborts the whole set.
 */
export const downloadConfigurationParts = async ({
  directory,
  ...options
}: FetchOptions & {directory: ConfigurationDirectory}): Promise<GlobalconfResult<ConfigurationPart[]>> => {
  const logger = options.logger ?? createNoopLogger();
  const parts: ConfigurationPart[] = [];

  for (const entry of directory.entries) {
    const url = resolveUrl({base: directory.sourceUrl, location: entry.location});
    if (!url) {
      return err('format_error', `Content location of ${entry.contentIdentifier} is not a URL: ${entry.location}`);
    }

    const response = await download({url, options});
    if (!response.ok) {
      logger.warn({
        event: 'globalconf.part.download_failed',
        component: COMPONENT,
        instance: entry.instanceId,
        source_url: url,
        reason_code: response.error.code,
        message: response.error.message || undefined
      });
      return err(
        response.error.code === 'timeout_error' ? 'timeout_error' : 'network_error',
        `Failed to download ${entry.contentIdentifier} from ${url}: ${response.error.message}`
      );
    }

    parts.push({
      contentIdentifier: entry.contentIdentifier,
      instanceId: entry.instanceId,
      location: entry.location,
      expirationTime: entry.expirationTime,
      digestAlgorithm: entry.digestAlgorithm,
      digestValue: entry.digestValue,
      formatVersion: directory.version,
      rawBytes: response.value.body
    });
  }

  return ok(parts);
};
