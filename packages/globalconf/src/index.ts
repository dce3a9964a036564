export {
  DIGEST_ALGORITHM_IDS,
  digestNameFor,
  SIGNATURE_ALGORITHM_IDS,
  signatureAlgorithmFor,
  type DigestName,
  type SignatureAlgorithm
} from './algorithms';
export {createConfigurationAnchor, decodeBase64, parseConfigurationAnchor} from './anchor';
export {
  ConfigurationAnchorSchema,
  ConfigurationSourceSchema,
  PRIVATE_PARAMETERS,
  SHARED_PARAMETERS,
  type ByteRange,
  type CentralService,
  type ConfigurationAnchor,
  type ConfigurationDirectory,
  type ConfigurationPart,
  type ConfigurationSource,
  type DirectoryEntry,
  type DirectorySignature,
  type GlobalGroup,
  type HostResolver,
  type Member,
  type MemberClass,
  type SecurityServer,
  type SharedParams,
  type SharedParamsSchemaVersion,
  type Subsystem,
  type SubsystemWithMemberName,
  type SubsystemWithServers,
  type VerifiedConfiguration,
  type VerifiedConfigurationPart
} from './contracts';
export {parseConfigurationDirectory} from './directory';
export {
  err,
  globalconfErrorCodes,
  ok,
  type GlobalconfError,
  type GlobalconfErrorCode,
  type GlobalconfFailure,
  type GlobalconfResult,
  type GlobalconfSuccess
} from './errors';
export {
  downloadConfigurationParts,
  fetchConfigurationDirectory,
  type FetchedDirectory,
  type FetchOptions
} from './fetcher';
export {
  loadGlobalConfiguration,
  type LoadedGlobalConfiguration,
  type LoadGlobalConfigurationInput
} from './loader';
export {
  dnsHostResolver,
  findSecurityServers,
  listCentralServices,
  listGlobalGroups,
  listMemberClasses,
  listMemberIdentifiers,
  listMembers,
  listRegisteredSubsystems,
  listSecurityServers,
  listSubsystems,
  listSubsystemsWithMemberName,
  listSubsystemsWithServers,
  resolveAddresses,
  resolveServerIps
} from './queries';
export {loadServerSharedParams, verificationConfUrl, type LoadServerSharedParamsInput} from './serverConf';
export {parseSharedParams, schemaVersionFor} from './sharedParams';
export {isVerifiedPart, verifyConfiguration} from './verifier';
