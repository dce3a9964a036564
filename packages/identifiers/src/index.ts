export {
  ClientIdentifierSchema,
  IdentifierPartSchema,
  isWellFormedPart,
  MemberIdentifierSchema,
  SecurityServerIdentifierSchema,
  ServiceIdentifierSchema,
  SubsystemIdentifierSchema,
  type ClientIdentifier,
  type MemberIdentifier,
  type SecurityServerIdentifier,
  type ServiceIdentifier,
  type SubsystemIdentifier,
  type XRoadIdentifier
} from './contracts';
export {
  decodeIdentifierPart,
  encodeIdentifierPart,
  formatIdentifier,
  identifierParts,
  memberOf,
  parseClientIdentifier,
  parseSecurityServerIdentifier,
  parseServiceIdentifier,
  parseSubsystemIdentifier,
  providerOfService,
  sameIdentifier,
  splitIdentifier,
  toIdentifierString
} from './encoding';
export {
  err,
  identifierErrorCodes,
  ok,
  type IdentifierError,
  type IdentifierErrorCode,
  type IdentifierFailure,
  type IdentifierResult,
  type IdentifierSuccess
} from './errors';
