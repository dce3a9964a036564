import {createNoopLogger, withLogContext} from '@xrdinfo/logging';
import {addUrlScheme} from '@xrdinfo/transport';
import JSZip from 'jszip';

import type {SharedParams} from './contracts';
import {err, ok, type GlobalconfResult} from './errors';
import {download, type FetchOptions} from './fetcher';
import {readSharedParams} from './sharedParams';

export type LoadServerSharedParamsInput = FetchOptions & {
  serverAddress: string;
  instance?: string;
};

const COMPONENT = 'globalconf.server';

const ARCHIVE_ROOT = 'verificationconf';
const INSTANCE_FILE = `${ARCHIVE_ROOT}/instance-identifier`;

const SCHEME_AND_AUTHORITY = /^[a-z][a-z0-9+.-]*:\/\/[^/?#]*/iu;

/**
 * A bare address or one without a path points at the verificationconf endpoint of the
 * security server; any other path is taken as given.
 */
export const verificationConfUrl = ({address, secure}: {address: string; secure: boolean}): string | undefined => {
  const url = addUrlScheme({address, secure});
  if (!URL.canParse(url)) return undefined;

  const path = url.replace(SCHEME_AND_AUTHORITY, '');
  if (path === '') return `${url}/${ARCHIVE_ROOT}`;
  if (path === '/') return `${url}${ARCHIVE_ROOT}`;
  return url;
};

const readArchive = async (body: Buffer): Promise<GlobalconfResult<JSZip>> => {
  try {
    return ok(await JSZip.loadAsync(body));
  } catch (unknownError) {
    const reason = unknownError instanceof Error ? unknownError.message : String(unknownError);
    return err('format_error', `Verification configuration is not a ZIP archive: ${reason}`);
  }
};

const readEntry = async ({archive, name}: {archive: JSZip; name: string}): Promise<string | undefined> => {
  const entry = archive.file(name);
  return entry ? entry.async('string') : undefined;
};

const load = async ({
  serverAddress,
  instance,
  ...options
}: LoadServerSharedParamsInput): Promise<GlobalconfResult<SharedParams>> => {
  const logger = options.logger ?? createNoopLogger();
  const startedAt = Date.now();

  const url = verificationConfUrl({address: serverAddress, secure: Boolean(options.tls)});
  if (!url) {
    return err('invalid_input', `Security server address is not a URL: ${serverAddress}`);
  }

  const response = await download({url, options});
  if (!response.ok) {
    logger.warn({
      event: 'globalconf.server.failed',
      component: COMPONENT,
      source_url: url,
      reason_code: response.error.code,
      message: response.error.message || undefined
    });
    return err(
      response.error.code === 'timeout_error' ? 'timeout_error' : 'network_error',
      `Failed to download verification configuration from ${url}: ${response.error.message}`
    );
  }

  const archive = await readArchive(response.value.body);
  if (!archive.ok) return archive;

  let targetInstance = instance;
  if (!targetInstance) {
    const identifier = (await readEntry({archive: archive.value, name: INSTANCE_FILE}))?.trim();
    if (!identifier) {
      return err('format_error', `Verification configuration has no ${INSTANCE_FILE}`);
    }
    targetInstance = identifier;
  }

  const xml = await readEntry({archive: archive.value, name: `${ARCHIVE_ROOT}/${targetInstance}/shared-params.xml`});
  if (xml === undefined) {
    return err('trust_error', `Security server holds no shared parameters for instance ${targetInstance}`);
  }

  // The security server keeps only configuration it has verified, in the current schema.
  const sharedParams = readSharedParams({
    xml,
    version: 'v3',
    instance: targetInstance,
    listedBy: 'security server lists'
  });
  if (!sharedParams.ok) return sharedParams;

  logger.info({
    event: 'globalconf.server.loaded',
    component: COMPONENT,
    instance: targetInstance,
    source_url: url,
    status_code: response.value.status,
    duration_ms: Date.now() - startedAt
  });

  return sharedParams;
};

/**
 * Reads shared parameters from the verification configuration a security server publishes,
 * for the given instance or the one the server itself belongs to.
 */
export const loadServerSharedParams = async (
  input: LoadServerSharedParamsInput
): Promise<GlobalconfResult<SharedParams>> =>
  withLogContext({operation: 'loadServerSharedParams', ...(input.instance ? {instance: input.instance} : {})}, () =>
    load(input)
  );
