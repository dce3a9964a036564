import {
  ClientIdentifierSchema,
  ServiceIdentifierSchema,
  type ClientIdentifier,
  type MemberIdentifier,
  type ServiceIdentifier,
  type SubsystemIdentifier
} from '@xrdinfo/identifiers';
import {createXmlParser, describeIssues, parseXml, RequiredTextSchema, XmlTextSchema} from '@xrdinfo/xml';
import {z} from 'zod';

import {
  SHARED_PARAMETERS,
  type CentralService,
  type GlobalGroup,
  type Member,
  type MemberClass,
  type SecurityServer,
  type SharedParams,
  type SharedParamsSchemaVersion,
  type Subsystem,
  type VerifiedConfigurationPart
} from './contracts';
import {err, ok, type GlobalconfResult} from './errors';
import {isVerifiedPart} from './verifier';

const oneOrMany = <T extends z.ZodTypeAny>(schema: T) =>
  z.union([z.array(schema), schema.transform(value => [value])]).default([]);

const MemberClassNodeSchema = z.object({
  code: RequiredTextSchema,
  description: XmlTextSchema.default('')
});

const IdentifierNodeSchema = z
  .object({
    '@_objectType': z.string(),
    xRoadInstance: RequiredTextSchema,
    memberClass: RequiredTextSchema,
    memberCode: RequiredTextSchema,
    subsystemCode: RequiredTextSchema.optional(),
    serviceCode: RequiredTextSchema.optional(),
    serviceVersion: RequiredTextSchema.optional()
  })
  .transform(node => ({
    objectType: node['@_objectType'],
    instance: node.xRoadInstance,
    memberClass: node.memberClass,
    memberCode: node.memberCode,
    ...(node.subsystemCode !== undefined ? {subsystemCode: node.subsystemCode} : {}),
    ...(node.serviceCode !== undefined ? {serviceCode: node.serviceCode} : {}),
    ...(node.serviceVersion !== undefined ? {serviceVersion: node.serviceVersion} : {})
  }));

const ClientNodeSchema = IdentifierNodeSchema.pipe(ClientIdentifierSchema);
const ServiceNodeSchema = IdentifierNodeSchema.pipe(ServiceIdentifierSchema);

const subsystemNodeSchemas = {
  v2: z.object({
    '@_id': z.string().min(1),
    subsystemCode: RequiredTextSchema
  }),
  // Later documents may name a subsystem on its own.
  v3: z.object({
    '@_id': z.string().min(1),
    subsystemCode: RequiredTextSchema,
    name: RequiredTextSchema.optional()
  })
} as const;

const buildDocumentSchema = (version: SharedParamsSchemaVersion) =>
  z.object({
    conf: z.object({
      instanceIdentifier: RequiredTextSchema,
      member: z
        .array(
          z.object({
            '@_id': z.string().min(1),
            memberClass: MemberClassNodeSchema,
            memberCode: RequiredTextSchema,
            name: RequiredTextSchema,
            subsystem: z.array(subsystemNodeSchemas[version]).default([])
          })
        )
        .default([]),
      securityServer: z
        .array(
          z.object({
            owner: RequiredTextSchema,
            serverCode: RequiredTextSchema,
            address: RequiredTextSchema.optional(),
            client: z.array(RequiredTextSchema).default([])
          })
        )
        .default([]),
      globalGroup: z
        .array(
          z.object({
            groupCode: RequiredTextSchema,
            description: XmlTextSchema.default(''),
            groupMember: z.array(ClientNodeSchema).default([])
          })
        )
        .default([]),
      centralService: z
        .array(
          z.object({
            serviceCode: RequiredTextSchema,
            implementingService: ServiceNodeSchema.optional()
          })
        )
        .default([]),
      globalSettings: z.object({memberClass: oneOrMany(MemberClassNodeSchema)}).optional()
    })
  });

type SharedParamsDocument = z.infer<ReturnType<typeof buildDocumentSchema>>['conf'];

type SubsystemNode = {subsystemCode: string; name?: string};

/** One extraction interface over every supported document schema version. */
type SharedParamsVariant = {
  version: SharedParamsSchemaVersion;
  schema: ReturnType<typeof buildDocumentSchema>;
  subsystemName: (node: SubsystemNode) => string | undefined;
};

const variants: Readonly<Record<SharedParamsSchemaVersion, SharedParamsVariant>> = {
  v2: {version: 'v2', schema: buildDocumentSchema('v2'), subsystemName: () => undefined},
  v3: {version: 'v3', schema: buildDocumentSchema('v3'), subsystemName: node => node.name}
};

export const schemaVersionFor = (formatVersion: number): SharedParamsSchemaVersion | undefined => {
  if (formatVersion === 2) return 'v2';
  if (formatVersion >= 3) return 'v3';
  return undefined;
};

const sharedParamsParser = createXmlParser([
  'member',
  'subsystem',
  'securityServer',
  'client',
  'globalGroup',
  'groupMember',
  'centralService'
]);

const deepFreeze = <T>(value: T): T => {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }

  return value;
};

const extract = ({
  document,
  variant
}: {
  document: SharedParamsDocument;
  variant: SharedParamsVariant;
}): GlobalconfResult<SharedParams> => {
  const instance = document.instanceIdentifier;
  const membersById = new Map<string, MemberIdentifier>();
  const clientsById = new Map<string, ClientIdentifier>();
  const members: Member[] = [];
  const subsystems: Subsystem[] = [];

  for (const memberNode of document.member) {
    const memberId: MemberIdentifier = {
      objectType: 'MEMBER',
      instance,
      memberClass: memberNode.memberClass.code,
      memberCode: memberNode.memberCode
    };
    membersById.set(memberNode['@_id'], memberId);
    clientsById.set(memberNode['@_id'], memberId);

    const memberSubsystems: SubsystemIdentifier[] = [];
    for (const subsystemNode of memberNode.subsystem) {
      const subsystemId: SubsystemIdentifier = {
        ...memberId,
        objectType: 'SUBSYSTEM',
        subsystemCode: subsystemNode.subsystemCode
      };
      clientsById.set(subsystemNode['@_id'], subsystemId);
      memberSubsystems.push(subsystemId);
      const name = variant.subsystemName(subsystemNode);
      subsystems.push({id: subsystemId, memberName: memberNode.name, ...(name !== undefined ? {name} : {})});
    }

    members.push({id: memberId, name: memberNode.name, subsystems: memberSubsystems});
  }

  const securityServers: SecurityServer[] = [];
  for (const serverNode of document.securityServer) {
    const owner = membersById.get(serverNode.owner);
    if (!owner) {
      return err('format_error', `Security server ${serverNode.serverCode} names unknown owner ${serverNode.owner}`);
    }

    const clients: ClientIdentifier[] = [];
    for (const clientRef of serverNode.client) {
      const client = clientsById.get(clientRef);
      if (!client) {
        return err('format_error', `Security server ${serverNode.serverCode} names unknown client ${clientRef}`);
      }

      clients.push(client);
    }

    securityServers.push({
      id: {
        objectType: 'SERVER',
        instance,
        memberClass: owner.memberClass,
        memberCode: owner.memberCode,
        serverCode: serverNode.serverCode
      },
      owner,
      ...(serverNode.address !== undefined ? {address: serverNode.address} : {}),
      clients
    });
  }

  const globalGroups: GlobalGroup[] = document.globalGroup.map(group => ({
    groupCode: group.groupCode,
    description: group.description,
    members: group.groupMember
  }));

  const centralServices: CentralService[] = document.centralService.map(service => {
    const implementingService: ServiceIdentifier | undefined = service.implementingService;
    return {serviceCode: service.serviceCode, ...(implementingService ? {implementingService} : {})};
  });

  const memberClasses: MemberClass[] = (document.globalSettings?.memberClass ?? []).map(memberClass => ({
    code: memberClass.code,
    description: memberClass.description
  }));

  return ok(
    deepFreeze({
      instanceIdentifier: instance,
      schemaVersion: variant.version,
      members,
      subsystems,
      securityServers,
      globalGroups,
      centralServices,
      memberClasses
    })
  );
};

export type SharedParamsSource = {
  xml: string;
  version: SharedParamsSchemaVersion;
  instance: string;
  // Where the expected instance comes from, for the mismatch message.
  listedBy: string;
};

/** Parses and indexes a shared parameters document whose origin the caller already trusts. */
export const readSharedParams = ({xml, version, instance, listedBy}: SharedParamsSource): GlobalconfResult<SharedParams> => {
  const document = parseXml({xml, parser: sharedParamsParser, label: 'Shared parameters'});
  if (!document.ok) {
    return document;
  }

  const variant = variants[version];
  const parsed = variant.schema.safeParse(document.value);
  if (!parsed.success) {
    return err('format_error', `Shared parameters are invalid: ${describeIssues(parsed.error)}`);
  }

  if (parsed.data.conf.instanceIdentifier !== instance) {
    return err('format_error', `Shared parameters name instance ${parsed.data.conf.instanceIdentifier}, ${listedBy} ${instance}`);
  }

  return extract({document: parsed.data.conf, variant});
};

/**
 * Builds the shared parameter indices from a verified SHARED-PARAMETERS part. Parts that did
 * not come out of the verifier are refused.
 */
export const parseSharedParams = (part: VerifiedConfigurationPart): GlobalconfResult<SharedParams> => {
  if (!isVerifiedPart(part)) {
    return err('trust_error', `${part.contentIdentifier} for ${part.instanceId} has not passed verification`);
  }

  if (part.contentIdentifier !== SHARED_PARAMETERS) {
    return err('invalid_input', `Expected ${SHARED_PARAMETERS}, got ${part.contentIdentifier}`);
  }

  const version = schemaVersionFor(part.formatVersion);
  if (!version) {
    return err('format_error', `Unsupported configuration version ${part.formatVersion}`);
  }

  return readSharedParams({
    xml: part.rawBytes.toString('utf8'),
    version,
    instance: part.instanceId,
    listedBy: 'directory lists'
  });
};
