import {
  listMembers,
  listRegisteredSubsystems,
  listSecurityServers,
  listSubsystemsWithMemberName,
  listSubsystemsWithServers,
  loadGlobalConfiguration,
  loadServerSharedParams,
  parseConfigurationAnchor,
  resolveServerIps,
  type HostResolver,
  type LoadedGlobalConfiguration,
  type SharedParams
} from '@xrdinfo/globalconf';
import {
  parseClientIdentifier,
  parseServiceIdentifier,
  parseSubsystemIdentifier,
  toIdentifierString,
  type ClientIdentifier,
  type ServiceIdentifier,
  type SubsystemIdentifier
} from '@xrdinfo/identifiers';
import type {StructuredLogger} from '@xrdinfo/logging';
import {
  createMetadataClient,
  listOpenApiEndpoints,
  listWsdlOperations,
  loadOpenApiDocument,
  sharedParamsAddressResolver,
  type MetadataClient,
  type MetadataTarget,
  type Protocol
} from '@xrdinfo/metadata-client';
import type {HttpRequestImpl, TlsOptions} from '@xrdinfo/transport';

import type {CliConfig, CommandName} from './config';
import {err, ok, type CommandResult} from './errors';
import {mapWithConcurrency} from './pool';

export type CommandContext = {
  config: CliConfig;
  logger: StructuredLogger;
  tls: TlsOptions | undefined;
  readFile: (path: string) => Promise<Buffer>;
  requestImpl?: HttpRequestImpl;
  hostResolver?: HostResolver;
  now: () => Date;
  // Failures that do not stop a sweep.
  reportProblem: (message: string) => void;
};

type Command = (context: CommandContext) => Promise<CommandResult<string[]>>;

const loadConfiguration = async (context: CommandContext): Promise<CommandResult<LoadedGlobalConfiguration>> => {
  const {config} = context;
  if (!config.anchorPath) {
    return err('config_error', 'No configuration anchor: set XRDINFO_ANCHOR or pass --anchor');
  }

  let anchorXml: Buffer;
  try {
    anchorXml = await context.readFile(config.anchorPath);
  } catch (unknownError) {
    const reason = unknownError instanceof Error ? unknownError.message : String(unknownError);
    return err('config_error', `Failed to read configuration anchor ${config.anchorPath}: ${reason}`);
  }

  const anchor = parseConfigurationAnchor(anchorXml);
  if (!anchor.ok) return anchor;

  return loadGlobalConfiguration({
    anchor: anchor.value,
    logger: context.logger,
    now: context.now(),
    ...(config.instance ? {instance: config.instance} : {}),
    ...(config.timeoutMs !== undefined ? {timeoutMs: config.timeoutMs} : {}),
    ...(context.tls ? {tls: context.tls} : {}),
    ...(context.requestImpl ? {requestImpl: context.requestImpl} : {})
  });
};

/**
 * Shared parameters from the anchor's verified configuration or, without an anchor, from the
 * verificationconf of a security server.
 */
const loadSharedParams = async (context: CommandContext): Promise<CommandResult<SharedParams>> => {
  const {config} = context;
  if (config.anchorPath) {
    const loaded = await loadConfiguration(context);
    return loaded.ok ? ok(loaded.value.sharedParams) : loaded;
  }

  const serverAddress = config.confServer ?? config.gatewayUrl;
  if (!serverAddress) {
    return err(
      'config_error',
      'No configuration source: set XRDINFO_ANCHOR, XRDINFO_CONF_SERVER or XRDINFO_GATEWAY_URL, or pass --anchor, --conf-server or --gateway'
    );
  }

  return loadServerSharedParams({
    serverAddress,
    logger: context.logger,
    ...(config.instance ? {instance: config.instance} : {}),
    ...(config.timeoutMs !== undefined ? {timeoutMs: config.timeoutMs} : {}),
    ...(context.tls ? {tls: context.tls} : {}),
    ...(context.requestImpl ? {requestImpl: context.requestImpl} : {})
  });
};

const members: Command = async context => {
  const loaded = await loadSharedParams(context);
  if (!loaded.ok) return loaded;

  return ok(listMembers(loaded.value).map(member => `${toIdentifierString(member.id)}\t${member.name}`));
};

const subsystems: Command = async context => {
  const loaded = await loadSharedParams(context);
  if (!loaded.ok) return loaded;

  const sharedParams = loaded.value;
  const {flags} = context.config;
  if (flags.withServers) {
    return ok(
      listSubsystemsWithServers(sharedParams).flatMap(({subsystem, servers}) => {
        const id = toIdentifierString(subsystem);
        return servers.length === 0
          ? [`${id}\tNOSERVER`]
          : servers.map(server => `${id}\t${toIdentifierString(server.id)}\t${server.address ?? ''}`);
      })
    );
  }

  if (flags.registered) {
    return ok(listRegisteredSubsystems(sharedParams).map(toIdentifierString));
  }

  return ok(
    listSubsystemsWithMemberName(sharedParams).map(
      ({subsystem, memberName}) => `${toIdentifierString(subsystem)}\t${memberName}`
    )
  );
};

const servers: Command = async context => {
  const loaded = await loadSharedParams(context);
  if (!loaded.ok) return loaded;

  return ok(
    listSecurityServers(loaded.value).map(server => `${toIdentifierString(server.id)}\t${server.address ?? ''}`)
  );
};

const serverIps: Command = async context => {
  const loaded = await loadSharedParams(context);
  if (!loaded.ok) return loaded;

  return ok(
    await resolveServerIps({
      sharedParams: loaded.value,
      logger: context.logger,
      ...(context.hostResolver ? {resolver: context.hostResolver} : {})
    })
  );
};

const expiration: Command = async context => {
  const loaded = await loadConfiguration(context);
  if (!loaded.ok) return loaded;

  const {parts} = loaded.value.configuration;
  if (context.config.flags.status) {
    const closest = Math.min(...parts.map(part => part.expirationTime.getTime()));
    const seconds = Math.max(0, Math.floor((closest - context.now().getTime()) / 1000));
    return ok([String(seconds)]);
  }

  return ok(
    parts.map(part => `${part.expirationTime.toISOString()}\t${part.instanceId}\t${part.contentIdentifier}`)
  );
};

const metadataTarget = async ({
  context,
  sharedParams
}: {
  context: CommandContext;
  sharedParams?: SharedParams;
}): Promise<CommandResult<MetadataTarget>> => {
  if (context.config.gatewayUrl) {
    return ok({gatewayUrl: context.config.gatewayUrl});
  }

  const loaded = sharedParams ? ok(sharedParams) : await loadSharedParams(context);
  if (!loaded.ok) return loaded;

  return ok({resolveAddress: sharedParamsAddressResolver(loaded.value)});
};

const createClient = async ({
  context,
  sharedParams
}: {
  context: CommandContext;
  sharedParams?: SharedParams;
}): Promise<CommandResult<MetadataClient>> => {
  const target = await metadataTarget({context, ...(sharedParams ? {sharedParams} : {})});
  if (!target.ok) return target;

  const {config} = context;
  return ok(
    createMetadataClient({
      target: target.value,
      logger: context.logger,
      ...(config.timeoutMs !== undefined ? {timeoutMs: config.timeoutMs} : {}),
      ...(config.userId ? {userId: config.userId} : {}),
      ...(context.tls ? {tls: context.tls} : {}),
      ...(context.requestImpl ? {requestImpl: context.requestImpl} : {})
    })
  );
};

const twoArguments = ({
  context,
  command,
  second
}: {
  context: CommandContext;
  command: CommandName;
  second: 'SUBSYSTEM' | 'SERVICE';
}): CommandResult<[string, string]> => {
  const [client, target, ...rest] = context.config.args;
  if (client === undefined || target === undefined || rest.length > 0) {
    return err('usage_error', `${command} takes CLIENT and ${second} identifiers`);
  }

  return ok([client, target]);
};

const sweepClient = (context: CommandContext): CommandResult<ClientIdentifier> => {
  const [client, ...rest] = context.config.args;
  if (client === undefined || rest.length > 0) {
    return err('usage_error', `${context.config.command} --all takes a CLIENT identifier`);
  }

  return parseClientIdentifier(client);
};

type SweepStep = {
  context: CommandContext;
  client: ClientIdentifier;
  metadata: MetadataClient;
  subsystem: SubsystemIdentifier;
};

/** Runs `visit` for every registered subsystem, `--threads` of them at a time. */
const sweepSubsystems = async ({
  context,
  visit
}: {
  context: CommandContext;
  visit: (step: SweepStep) => Promise<string[]>;
}): Promise<CommandResult<string[]>> => {
  const client = sweepClient(context);
  if (!client.ok) return client;

  const sharedParams = await loadSharedParams(context);
  if (!sharedParams.ok) return sharedParams;

  const metadata = await createClient({context, sharedParams: sharedParams.value});
  if (!metadata.ok) return metadata;

  const lines = await mapWithConcurrency({
    items: listRegisteredSubsystems(sharedParams.value),
    limit: context.config.threads,
    task: subsystem => visit({context, client: client.value, metadata: metadata.value, subsystem})
  });

  return ok(lines.flat());
};

const listSubsystemMethods = async ({context, client, metadata, subsystem}: SweepStep) => {
  const protocol: Protocol = context.config.flags.rest ? 'REST' : 'SOAP';
  const request = {client, service: subsystem, protocol};
  const listed = context.config.flags.allowed
    ? await metadata.allowedMethods(request)
    : await metadata.listMethods(request);
  if (!listed.ok) {
    context.reportProblem(`${toIdentifierString(subsystem)}: ${listed.error.message}`);
    return [];
  }

  return listed.value.map(toIdentifierString);
};

const operationService = ({
  subsystem,
  name,
  version
}: {
  subsystem: SubsystemIdentifier;
  name: string;
  version?: string;
}): ServiceIdentifier => ({
  objectType: 'SERVICE',
  instance: subsystem.instance,
  memberClass: subsystem.memberClass,
  memberCode: subsystem.memberCode,
  subsystemCode: subsystem.subsystemCode,
  serviceCode: name,
  ...(version ? {serviceVersion: version} : {})
});

/**
 * One `SERVICE<TAB>STATUS` line per SOAP service of the subsystem. A service already described
 * by an earlier WSDL of the subsystem is not asked again, and after a timeout the remaining
 * services are skipped.
 */
const checkSubsystemWsdls = async ({context, client, metadata, subsystem}: SweepStep) => {
  const listed = await metadata.listMethods({client, service: subsystem, protocol: 'SOAP'});
  if (!listed.ok) {
    context.reportProblem(`${toIdentifierString(subsystem)}: ${listed.error.message}`);
    return [];
  }

  const described = new Set<string>();
  const lines: string[] = [];
  let timedOut = false;
  const services = listed.value
    .map(service => ({id: toIdentifierString(service), service}))
    .sort((left, right) => (left.id < right.id ? -1 : left.id > right.id ? 1 : 0));
  for (const {id, service} of services) {
    if (described.has(id)) {
      lines.push(`${id}\tOK`);
      continue;
    }
    if (timedOut) {
      lines.push(`${id}\tSKIPPED`);
      continue;
    }

    const wsdl = await metadata.getWsdl({client, service});
    const operations = wsdl.ok ? listWsdlOperations(wsdl.value) : wsdl;
    if (!operations.ok) {
      timedOut = operations.error.code === 'timeout_error';
      lines.push(`${id}\t${timedOut ? 'TIMEOUT' : 'ERROR'}`);
      context.reportProblem(`${id}: ${operations.error.message}`);
      continue;
    }

    for (const operation of operations.value) {
      described.add(toIdentifierString(operationService({subsystem, ...operation})));
    }
    lines.push(`${id}\tOK`);
  }

  return lines;
};

const methods: Command = async context => {
  if (context.config.flags.all) {
    return sweepSubsystems({context, visit: listSubsystemMethods});
  }

  const args = twoArguments({context, command: 'methods', second: 'SUBSYSTEM'});
  if (!args.ok) return args;

  const client = parseClientIdentifier(args.value[0]);
  if (!client.ok) return client;
  const service = parseSubsystemIdentifier(args.value[1]);
  if (!service.ok) return service;

  const metadata = await createClient({context});
  if (!metadata.ok) return metadata;

  const protocol: Protocol = context.config.flags.rest ? 'REST' : 'SOAP';
  const request = {client: client.value, service: service.value, protocol};
  const listed = context.config.flags.allowed
    ? await metadata.value.allowedMethods(request)
    : await metadata.value.listMethods(request);
  if (!listed.ok) return listed;

  return ok(listed.value.map(toIdentifierString));
};

const describeService =
  (command: 'wsdl' | 'openapi'): Command =>
  async context => {
    if (command === 'wsdl' && context.config.flags.all) {
      return sweepSubsystems({context, visit: checkSubsystemWsdls});
    }

    const args = twoArguments({context, command, second: 'SERVICE'});
    if (!args.ok) return args;

    const client = parseClientIdentifier(args.value[0]);
    if (!client.ok) return client;
    const service = parseServiceIdentifier(args.value[1]);
    if (!service.ok) return service;

    const metadata = await createClient({context});
    if (!metadata.ok) return metadata;

    const request = {client: client.value, service: service.value};
    const {flags} = context.config;

    if (command === 'wsdl') {
      const wsdl = await metadata.value.getWsdl(request);
      if (!wsdl.ok) return wsdl;
      if (!flags.operations) return ok([wsdl.value.trimEnd()]);

      const operations = listWsdlOperations(wsdl.value);
      if (!operations.ok) return operations;
      return ok(operations.value.map(operation => [operation.name, operation.version].filter(Boolean).join('\t')));
    }

    const description = await metadata.value.getOpenApi(request);
    if (!description.ok) return description;
    if (!flags.endpoints) return ok([description.value.trimEnd()]);

    const document = loadOpenApiDocument(description.value);
    if (!document.ok) return document;
    const endpoints = listOpenApiEndpoints(document.value.document);
    if (!endpoints.ok) return endpoints;
    return ok(endpoints.value.map(endpoint => `${endpoint.method}\t${endpoint.path}`));
  };

const commands: Record<CommandName, Command> = {
  members,
  subsystems,
  servers,
  'server-ips': serverIps,
  methods,
  wsdl: describeService('wsdl'),
  openapi: describeService('openapi'),
  expiration
};

export const runCommand = (context: CommandContext): Promise<CommandResult<string[]>> =>
  commands[context.config.command](context);
