import {lookup} from 'node:dns/promises';

import {
  sameIdentifier,
  toIdentifierString,
  type ClientIdentifier,
  type MemberIdentifier,
  type SubsystemIdentifier
} from '@xrdinfo/identifiers';
import {createNoopLogger, type StructuredLogger} from '@xrdinfo/logging';

import type {
  CentralService,
  GlobalGroup,
  HostResolver,
  Member,
  MemberClass,
  SecurityServer,
  SharedParams,
  SubsystemWithMemberName,
  SubsystemWithServers
} from './contracts';
import {err, ok, type GlobalconfResult} from './errors';

export const listMembers = (sharedParams: SharedParams): readonly Member[] => sharedParams.members;

export const listMemberIdentifiers = (sharedParams: SharedParams): MemberIdentifier[] =>
  sharedParams.members.map(member => member.id);

export const listSubsystems = (sharedParams: SharedParams): SubsystemIdentifier[] =>
  sharedParams.subsystems.map(subsystem => subsystem.id);

export const listSubsystemsWithMemberName = (sharedParams: SharedParams): SubsystemWithMemberName[] =>
  sharedParams.subsystems.map(subsystem => ({subsystem: subsystem.id, memberName: subsystem.memberName}));

export const findSecurityServers = ({
  sharedParams,
  client
}: {
  sharedParams: SharedParams;
  client: ClientIdentifier;
}): SecurityServer[] =>
  sharedParams.securityServers.filter(server => server.clients.some(candidate => sameIdentifier(candidate, client)));

/** Subsystems attached to at least one security server. */
export const listRegisteredSubsystems = (sharedParams: SharedParams): SubsystemIdentifier[] =>
  listSubsystems(sharedParams).filter(subsystem => findSecurityServers({sharedParams, client: subsystem}).length > 0);

export const listSubsystemsWithServers = (sharedParams: SharedParams): SubsystemWithServers[] =>
  listSubsystems(sharedParams).map(subsystem => ({
    subsystem,
    servers: findSecurityServers({sharedParams, client: subsystem})
  }));

export const listSecurityServers = (sharedParams: SharedParams): readonly SecurityServer[] =>
  sharedParams.securityServers;

export const listGlobalGroups = (sharedParams: SharedParams): readonly GlobalGroup[] => sharedParams.globalGroups;

export const listCentralServices = (sharedParams: SharedParams): readonly CentralService[] =>
  sharedParams.centralServices;

export const listMemberClasses = (sharedParams: SharedParams): readonly MemberClass[] => sharedParams.memberClasses;

const addressesOf = (servers: readonly SecurityServer[]): string[] =>
  servers.flatMap(server => (server.address !== undefined ? [server.address] : []));

/**
 * Addresses of every security server that serves the client, in document order and without
 * duplicates. Servers registered without an address are skipped.
 */
export const resolveAddresses = ({
  sharedParams,
  client
}: {
  sharedParams: SharedParams;
  client: ClientIdentifier;
}): GlobalconfResult<string[]> => {
  const servers = findSecurityServers({sharedParams, client});
  if (servers.length === 0) {
    return err('address_resolution_error', `No security server is registered for ${toIdentifierString(client)}`);
  }

  const addresses = [...new Set(addressesOf(servers))];
  if (addresses.length === 0) {
    return err('address_resolution_error', `No security server of ${toIdentifierString(client)} has an address`);
  }

  return ok(addresses);
};

export const dnsHostResolver: HostResolver = async hostname => {
  const records = await lookup(hostname, {all: true, family: 4});
  return records.map(record => record.address);
};

/**
 * IPv4 addresses of all security servers. Servers without an address and host names that fail
 * to resolve are skipped.
 */
export const resolveServerIps = async ({
  sharedParams,
  resolver = dnsHostResolver,
  logger = createNoopLogger()
}: {
  sharedParams: SharedParams;
  resolver?: HostResolver;
  logger?: StructuredLogger;
}): Promise<string[]> => {
  const ips: string[] = [];
  for (const address of addressesOf(sharedParams.securityServers)) {
    try {
      ips.push(...(await resolver(address)));
    } catch (unknownError) {
      const reason = unknownError instanceof Error ? unknownError.message : String(unknownError);
      logger.debug({
        event: 'globalconf.address.unresolved',
        component: 'globalconf.queries',
        target: address,
        message: reason || undefined
      });
    }
  }

  return ips;
};
