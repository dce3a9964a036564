import {parseHeaderValue, splitMultipartBody, type MultipartPart} from '@xrdinfo/transport';

import {decodeBase64} from './anchor';
import type {ConfigurationDirectory, DirectoryEntry, DirectorySignature} from './contracts';
import {err, ok, type GlobalconfResult} from './errors';

const requireHeader = ({
  part,
  name,
  context
}: {
  part: MultipartPart;
  name: string;
  context: string;
}): GlobalconfResult<string> => {
  const value = part.headers[name];
  return value ? ok(value) : err('format_error', `${context} is missing the ${name} header`);
};

const parseTimestamp = ({value, context}: {value: string; context: string}): GlobalconfResult<Date> => {
  const timestamp = new Date(value);
  return Number.isNaN(timestamp.getTime())
    ? err('format_error', `${context} has an invalid expiration date: ${value}`)
    : ok(timestamp);
};

const rangeOf = ({part, body}: {part: MultipartPart; body: Buffer}) => {
  const start = part.raw.byteOffset - body.byteOffset;
  return {start, end: start + part.raw.length};
};

const parseEntry = ({
  part,
  index,
  body,
  expirationTime
}: {
  part: MultipartPart;
  index: number;
  body: Buffer;
  expirationTime: Date;
}): GlobalconfResult<DirectoryEntry> => {
  const context = `Directory entry ${index}`;
  const identifier = requireHeader({part, name: 'content-identifier', context});
  if (!identifier.ok) return identifier;
  const location = requireHeader({part, name: 'content-location', context});
  if (!location.ok) return location;
  const digestAlgorithm = requireHeader({part, name: 'hash-algorithm-id', context});
  if (!digestAlgorithm.ok) return digestAlgorithm;

  const contentIdentifier = parseHeaderValue(identifier.value);
  const instanceId = contentIdentifier.params.instance;
  if (!instanceId) {
    return err('format_error', `${context} content identifier names no instance: ${identifier.value}`);
  }

  const digestValue = part.body.toString('latin1').trim();
  if (!decodeBase64(digestValue)) {
    return err('format_error', `${context} digest is not base64`);
  }

  const ownExpiration = part.headers['expire-date'];
  let entryExpiration = expirationTime;
  if (ownExpiration) {
    const parsed = parseTimestamp({value: ownExpiration, context});
    if (!parsed.ok) return parsed;
    entryExpiration = parsed.value;
  }

  return ok({
    contentIdentifier: contentIdentifier.value,
    instanceId,
    location: location.value,
    expirationTime: entryExpiration,
    digestAlgorithm: digestAlgorithm.value,
    digestValue,
    range: rangeOf({part, body})
  });
};

const parseSignature = (part: MultipartPart): GlobalconfResult<DirectorySignature> => {
  const context = 'Directory signature part';
  const algorithmId = requireHeader({part, name: 'signature-algorithm-id', context});
  if (!algorithmId.ok) return algorithmId;
  const certHashHeader = requireHeader({part, name: 'verification-certificate-hash', context});
  if (!certHashHeader.ok) return certHashHeader;

  const certHash = parseHeaderValue(certHashHeader.value);
  const verificationCertHash = decodeBase64(certHash.value);
  const verificationCertHashAlgorithm = certHash.params['hash-algorithm-id'];
  if (!verificationCertHash || !verificationCertHashAlgorithm) {
    return err('format_error', `${context} has a malformed verification certificate hash`);
  }

  const value = decodeBase64(part.body.toString('latin1'));
  if (!value) {
    return err('format_error', `${context} does not hold a base64 signature`);
  }

  return ok({algorithmId: algorithmId.value, value, verificationCertHash, verificationCertHashAlgorithm});
};

/**
 * Parses a configuration directory: a multipart envelope whose first part is the signed
 * listing and whose second part is the detached signature over that part's exact bytes.
 */
export const parseConfigurationDirectory = ({
  body,
  contentType,
  sourceUrl
}: {
  body: Buffer;
  contentType?: string;
  sourceUrl: string;
}): GlobalconfResult<ConfigurationDirectory> => {
  const envelope = splitMultipartBody({body, contentType});
  if (!envelope.ok) {
    return err('format_error', `Configuration directory: ${envelope.error.message}`);
  }

  const [signedPart, signaturePart] = envelope.value;
  if (!signedPart || !signaturePart) {
    return err('format_error', 'Configuration directory needs a signed-data part and a signature part');
  }

  const listing = splitMultipartBody({body: signedPart.body, contentType: signedPart.headers['content-type']});
  if (!listing.ok) {
    return err('format_error', `Configuration directory listing: ${listing.error.message}`);
  }

  const [listingHeader, ...entryParts] = listing.value;
  if (!listingHeader) {
    return err('format_error', 'Configuration directory listing is empty');
  }

  const expireDate = requireHeader({part: listingHeader, name: 'expire-date', context: 'Directory listing'});
  if (!expireDate.ok) return expireDate;
  const versionHeader = requireHeader({part: listingHeader, name: 'version', context: 'Directory listing'});
  if (!versionHeader.ok) return versionHeader;

  const expirationTime = parseTimestamp({value: expireDate.value, context: 'Directory listing'});
  if (!expirationTime.ok) return expirationTime;
  const version = Number(versionHeader.value);
  if (!Number.isInteger(version) || version < 1) {
    return err('format_error', `Directory listing has an invalid version: ${versionHeader.value}`);
  }

  const entries: DirectoryEntry[] = [];
  for (const [index, part] of entryParts.entries()) {
    const entry = parseEntry({part, index: index + 1, body, expirationTime: expirationTime.value});
    if (!entry.ok) return entry;
    entries.push(entry.value);
  }

  const signature = parseSignature(signaturePart);
  if (!signature.ok) return signature;

  return ok({
    sourceUrl,
    version,
    expirationTime: expirationTime.value,
    entries,
    signedData: signedPart.raw,
    signature: signature.value
  });
};
