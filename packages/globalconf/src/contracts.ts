import {z} from 'zod';

import type {
  ClientIdentifier,
  MemberIdentifier,
  SecurityServerIdentifier,
  ServiceIdentifier,
  SubsystemIdentifier
} from '@xrdinfo/identifiers';

export const SHARED_PARAMETERS = 'SHARED-PARAMETERS';
export const PRIVATE_PARAMETERS = 'PRIVATE-PARAMETERS';

export const ConfigurationSourceSchema = z
  .object({
    downloadUrl: z.string().url(),
    verificationCerts: z.array(z.instanceof(Buffer)).min(1)
  })
  .strict();

export type ConfigurationSource = z.infer<typeof ConfigurationSourceSchema>;

export const ConfigurationAnchorSchema = z
  .object({
    instanceIdentifier: z.string().min(1),
    sources: z.array(ConfigurationSourceSchema).min(1),
    generatedAt: z.date().optional()
  })
  .strict();

export type ConfigurationAnchor = z.infer<typeof ConfigurationAnchorSchema>;

export type ByteRange = {
  start: number;
  end: number;
};

export type DirectoryEntry = {
  contentIdentifier: string;
  instanceId: string;
  location: string;
  expirationTime: Date;
  digestAlgorithm: string;
  digestValue: string;
  range: ByteRange;
};

export type DirectorySignature = {
  algorithmId: string;
  value: Buffer;
  verificationCertHash: Buffer;
  verificationCertHashAlgorithm: string;
};

export type ConfigurationDirectory = {
  sourceUrl: string;
  version: number;
  expirationTime: Date;
  entries: DirectoryEntry[];
  signedData: Buffer;
  signature: DirectorySignature;
};

export type ConfigurationPart = {
  contentIdentifier: string;
  instanceId: string;
  location: string;
  expirationTime: Date;
  digestAlgorithm: string;
  digestValue: string;
  formatVersion: number;
  rawBytes: Buffer;
};

export type VerifiedConfigurationPart = Readonly<ConfigurationPart & {stale: boolean}>;

export type VerifiedConfiguration = Readonly<{
  instanceIdentifier: string;
  sourceUrl: string;
  version: number;
  expirationTime: Date;
  stale: boolean;
  parts: readonly VerifiedConfigurationPart[];
}>;

export type SharedParamsSchemaVersion = 'v2' | 'v3';

export type Member = Readonly<{
  id: MemberIdentifier;
  name: string;
  subsystems: readonly SubsystemIdentifier[];
}>;

export type Subsystem = Readonly<{
  id: SubsystemIdentifier;
  memberName: string;
  name?: string;
}>;

export type SecurityServer = Readonly<{
  id: SecurityServerIdentifier;
  owner: MemberIdentifier;
  address?: string;
  clients: readonly ClientIdentifier[];
}>;

export type GlobalGroup = Readonly<{
  groupCode: string;
  description: string;
  members: readonly ClientIdentifier[];
}>;

export type CentralService = Readonly<{
  serviceCode: string;
  implementingService?: ServiceIdentifier;
}>;

export type MemberClass = Readonly<{
  code: string;
  description: string;
}>;

export type SharedParams = Readonly<{
  instanceIdentifier: string;
  schemaVersion: SharedParamsSchemaVersion;
  members: readonly Member[];
  subsystems: readonly Subsystem[];
  securityServers: readonly SecurityServer[];
  globalGroups: readonly GlobalGroup[];
  centralServices: readonly CentralService[];
  memberClasses: readonly MemberClass[];
}>;

export type SubsystemWithServers = Readonly<{
  subsystem: SubsystemIdentifier;
  servers: readonly SecurityServer[];
}>;

export type SubsystemWithMemberName = Readonly<{
  subsystem: SubsystemIdentifier;
  memberName: string;
}>;

export type HostResolver = (hostname: string) => Promise<string[]>;
