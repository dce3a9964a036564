import {createNoopLogger, withLogContext} from '@xrdinfo/logging';

import {SHARED_PARAMETERS, type ConfigurationAnchor, type SharedParams, type VerifiedConfiguration} from './contracts';
import {parseConfigurationDirectory} from './directory';
import {err, ok, type GlobalconfResult} from './errors';
import {downloadConfigurationParts, fetchConfigurationDirectory, type FetchOptions} from './fetcher';
import {parseSharedParams} from './sharedParams';
import {verifyConfiguration} from './verifier';

export type LoadedGlobalConfiguration = {
  configuration: VerifiedConfiguration;
  sharedParams: SharedParams;
};

export type LoadGlobalConfigurationInput = FetchOptions & {
  anchor: ConfigurationAnchor;
  instance?: string;
  now?: Date;
};

const COMPONENT = 'globalconf.loader';

const load = async ({
  anchor,
  instance,
  now,
  ...options
}: LoadGlobalConfigurationInput): Promise<GlobalconfResult<LoadedGlobalConfiguration>> => {
  const logger = options.logger ?? createNoopLogger();
  const startedAt = Date.now();

  const fetched = await fetchConfigurationDirectory({anchor, ...options});
  if (!fetched.ok) return fetched;

  const directory = parseConfigurationDirectory(fetched.value);
  if (!directory.ok) return directory;

  const parts = await downloadConfigurationParts({directory: directory.value, ...options});
  if (!parts.ok) return parts;

  const configuration = verifyConfiguration({
    anchor,
    directory: directory.value,
    parts: parts.value,
    logger,
    ...(now ? {now} : {})
  });
  if (!configuration.ok) return configuration;

  const targetInstance = instance ?? anchor.instanceIdentifier;
  const sharedParamsPart = configuration.value.parts.find(
    part => part.contentIdentifier === SHARED_PARAMETERS && part.instanceId === targetInstance
  );
  // The trusted configuration does not vouch for an instance it does not list.
  if (!sharedParamsPart) {
    return err('trust_error', `Configuration holds no ${SHARED_PARAMETERS} for instance ${targetInstance}`);
  }

  const sharedParams = parseSharedParams(sharedParamsPart);
  if (!sharedParams.ok) return sharedParams;

  logger.info({
    event: 'globalconf.load.completed',
    component: COMPONENT,
    instance: targetInstance,
    source_url: configuration.value.sourceUrl,
    duration_ms: Date.now() - startedAt,
    metadata: {parts: configuration.value.parts.length, stale: configuration.value.stale}
  });

  return ok({configuration: configuration.value, sharedParams: sharedParams.value});
};

/**
 * Fetches, verifies and indexes the global configuration of an instance. Any failure along
 * the way fails the whole load; nothing partially verified is returned.
 */
export const loadGlobalConfiguration = async (
  input: LoadGlobalConfigurationInput
): Promise<GlobalconfResult<LoadedGlobalConfiguration>> => {
  const fields = {
    instance: input.instance ?? input.anchor.instanceIdentifier,
    operation: 'loadGlobalConfiguration'
  };

  return withLogContext(fields, () => load(input));
};
