import {
  isWellFormedPart,
  type ClientIdentifier,
  type MemberIdentifier,
  type SecurityServerIdentifier,
  type ServiceIdentifier,
  type SubsystemIdentifier,
  type XRoadIdentifier
} from './contracts';
import {err, ok, type IdentifierResult} from './errors';

const IDENTIFIER_SEPARATOR = '/';

// encodeURIComponent leaves these sub-delimiters as they are; the wire form escapes every
// character outside the RFC 3986 unreserved set.
const RESERVED_BY_WIRE_FORM = /[!'()*]/gu;

const LONE_SURROGATES = /\p{Cs}/gu;
const REPLACEMENT_CHARACTER = '\uFFFD';

/** Unpaired surrogates are written as U+FFFD; parsers refuse them before they get here. */
export const encodeIdentifierPart = (part: string): string =>
  encodeURIComponent(part.replace(LONE_SURROGATES, REPLACEMENT_CHARACTER)).replace(
    RESERVED_BY_WIRE_FORM,
    character => `%${character.charCodeAt(0).toString(16).toUpperCase()}`
  );

export const decodeIdentifierPart = (part: string): IdentifierResult<string> => {
  let decoded: string;
  try {
    decoded = decodeURIComponent(part);
  } catch {
    return err('invalid_identifier', `Identifier part is not valid percent-encoding: ${part}`);
  }

  if (!isWellFormedPart(decoded)) {
    return err('invalid_identifier', 'Identifier part contains an unpaired surrogate');
  }

  return ok(decoded);
};

export const formatIdentifier = (parts: readonly string[]): string =>
  parts.map(encodeIdentifierPart).join(IDENTIFIER_SEPARATOR);

export const splitIdentifier = (text: string): IdentifierResult<string[]> => {
  const parts: string[] = [];
  for (const rawPart of text.split(IDENTIFIER_SEPARATOR)) {
    const decoded = decodeIdentifierPart(rawPart);
    if (!decoded.ok) {
      return decoded;
    }

    parts.push(decoded.value);
  }

  return ok(parts);
};

export const identifierParts = (identifier: XRoadIdentifier): string[] => {
  switch (identifier.objectType) {
    case 'MEMBER':
      return [identifier.instance, identifier.memberClass, identifier.memberCode];
    case 'SUBSYSTEM':
      return [identifier.instance, identifier.memberClass, identifier.memberCode, identifier.subsystemCode];
    case 'SERVICE':
      return [
        identifier.instance,
        identifier.memberClass,
        identifier.memberCode,
        // Member-level services keep the position with an empty part.
        identifier.subsystemCode ?? '',
        identifier.serviceCode,
        ...(identifier.serviceVersion ? [identifier.serviceVersion] : [])
      ];
    case 'SERVER':
      return [identifier.instance, identifier.memberClass, identifier.memberCode, identifier.serverCode];
  }
};

export const toIdentifierString = (identifier: XRoadIdentifier): string =>
  formatIdentifier(identifierParts(identifier));

/** The client that provides a service: its subsystem, or the member itself. */
export const providerOfService = (service: ServiceIdentifier): ClientIdentifier =>
  service.subsystemCode === undefined
    ? {
        objectType: 'MEMBER',
        instance: service.instance,
        memberClass: service.memberClass,
        memberCode: service.memberCode
      }
    : {
        objectType: 'SUBSYSTEM',
        instance: service.instance,
        memberClass: service.memberClass,
        memberCode: service.memberCode,
        subsystemCode: service.subsystemCode
      };

export const memberOf = (identifier: Exclude<XRoadIdentifier, MemberIdentifier>): MemberIdentifier => ({
  objectType: 'MEMBER',
  instance: identifier.instance,
  memberClass: identifier.memberClass,
  memberCode: identifier.memberCode
});

const requireNonEmpty = ({parts, text}: {parts: string[]; text: string}): IdentifierResult<string[]> =>
  parts.every(part => part.length > 0)
    ? ok(parts)
    : err('invalid_identifier', `Identifier has an empty part: "${text}"`);

const splitWithLength = ({
  text,
  lengths,
  kind
}: {
  text: string;
  lengths: readonly number[];
  kind: string;
}): IdentifierResult<string[]> => {
  const split = splitIdentifier(text);
  if (!split.ok) {
    return split;
  }

  if (!lengths.includes(split.value.length)) {
    return err('invalid_identifier', `${kind} identifier is incorrect: "${text}"`);
  }

  return ok(split.value);
};

export const parseClientIdentifier = (text: string): IdentifierResult<ClientIdentifier> => {
  const split = splitWithLength({text, lengths: [3, 4], kind: 'Client'});
  if (!split.ok) {
    return split;
  }

  // A trailing empty subsystem code addresses the member itself.
  const parts = split.value[3] === '' ? split.value.slice(0, 3) : split.value;
  const checked = requireNonEmpty({parts, text});
  if (!checked.ok) {
    return checked;
  }

  const [instance = '', memberClass = '', memberCode = '', subsystemCode] = checked.value;
  if (subsystemCode === undefined) {
    return ok({objectType: 'MEMBER', instance, memberClass, memberCode});
  }

  return ok({objectType: 'SUBSYSTEM', instance, memberClass, memberCode, subsystemCode});
};

export const parseSubsystemIdentifier = (text: string): IdentifierResult<SubsystemIdentifier> => {
  const split = splitWithLength({text, lengths: [4], kind: 'Subsystem'});
  if (!split.ok) {
    return split;
  }

  const checked = requireNonEmpty({parts: split.value, text});
  if (!checked.ok) {
    return checked;
  }

  const [instance = '', memberClass = '', memberCode = '', subsystemCode = ''] = checked.value;
  return ok({objectType: 'SUBSYSTEM', instance, memberClass, memberCode, subsystemCode});
};

export const parseServiceIdentifier = (text: string): IdentifierResult<ServiceIdentifier> => {
  const split = splitWithLength({text, lengths: [5, 6], kind: 'Service'});
  if (!split.ok) {
    return split;
  }

  const parts = split.value[5] === '' ? split.value.slice(0, 5) : split.value;
  const [instance = '', memberClass = '', memberCode = '', subsystemCode = '', serviceCode = '', serviceVersion] =
    parts;
  // An empty subsystem part names a service of the member itself.
  const checked = requireNonEmpty({
    parts: [instance, memberClass, memberCode, serviceCode, ...(serviceVersion !== undefined ? [serviceVersion] : [])],
    text
  });
  if (!checked.ok) {
    return checked;
  }

  return ok({
    objectType: 'SERVICE',
    instance,
    memberClass,
    memberCode,
    ...(subsystemCode !== '' ? {subsystemCode} : {}),
    serviceCode,
    ...(serviceVersion !== undefined ? {serviceVersion} : {})
  });
};

export const parseSecurityServerIdentifier = (text: string): IdentifierResult<SecurityServerIdentifier> => {
  const split = splitWithLength({text, lengths: [4], kind: 'Security server'});
  if (!split.ok) {
    return split;
  }

  const checked = requireNonEmpty({parts: split.value, text});
  if (!checked.ok) {
    return checked;
  }

  const [instance = '', memberClass = '', memberCode = '', serverCode = ''] = checked.value;
  return ok({objectType: 'SERVER', instance, memberClass, memberCode, serverCode});
};

export const sameIdentifier = (left: XRoadIdentifier, right: XRoadIdentifier): boolean =>
  left.objectType === right.objectType && toIdentifierString(left) === toIdentifierString(right);
