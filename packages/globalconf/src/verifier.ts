import {constants, createHash, createPublicKey, verify, type KeyObject, type VerifyKeyObjectInput} from 'node:crypto';

import * as x509 from '@peculiar/x509';
import {createNoopLogger, type StructuredLogger} from '@xrdinfo/logging';

import {decodeBase64} from './anchor';
import {digestNameFor, signatureAlgorithmFor, type SignatureAlgorithm} from './algorithms';
import type {
  ConfigurationAnchor,
  ConfigurationDirectory,
  ConfigurationPart,
  VerifiedConfiguration,
  VerifiedConfigurationPart
} from './contracts';
import {err, ok, type GlobalconfResult} from './errors';

const COMPONENT = 'globalconf.verifier';

const verifiedParts = new WeakSet<VerifiedConfigurationPart>();

/** True only for parts produced by {@link verifyConfiguration} in this process. */
export const isVerifiedPart = (part: VerifiedConfigurationPart): boolean => verifiedParts.has(part);

type SigningCertificate = {
  subject: string;
  publicKey: KeyObject;
};

const loadCertificate = (der: Buffer): GlobalconfResult<SigningCertificate> => {
  try {
    const certificate = new x509.X509Certificate(der);
    const publicKey = createPublicKey({
      key: Buffer.from(certificate.publicKey.rawData),
      format: 'der',
      type: 'spki'
    });
    return ok({subject: certificate.subject, publicKey});
  } catch (unknownError) {
    const reason = unknownError instanceof Error ? unknownError.message : String(unknownError);
    return err('trust_error', `Anchor verification certificate cannot be read: ${reason}`);
  }
};

const findSigningCertificate = ({
  anchor,
  directory
}: {
  anchor: ConfigurationAnchor;
  directory: ConfigurationDirectory;
}): GlobalconfResult<SigningCertificate> => {
  const source = anchor.sources.find(candidate => candidate.downloadUrl === directory.sourceUrl);
  if (!source) {
    return err('trust_error', `Configuration source ${directory.sourceUrl} is not listed in the anchor`);
  }

  const hashName = digestNameFor(directory.signature.verificationCertHashAlgorithm);
  if (!hashName) {
    return err(
      'trust_error',
      `Unsupported verification certificate hash algorithm: ${directory.signature.verificationCertHashAlgorithm}`
    );
  }

  const match = source.verificationCerts.find(der =>
    createHash(hashName).update(der).digest().equals(directory.signature.verificationCertHash)
  );
  if (!match) {
    return err('trust_error', 'No anchor certificate matches the directory verification certificate hash');
  }

  return loadCertificate(match);
};

const keyTypeMatches = ({publicKey, algorithm}: {publicKey: KeyObject; algorithm: SignatureAlgorithm}) => {
  const keyType = publicKey.asymmetricKeyType;
  return algorithm.keyType === 'ec' ? keyType === 'ec' : keyType === 'rsa' || keyType === 'rsa-pss';
};

// Central servers sign with DER-encoded ECDSA values; XML signature tools write raw r||s.
const EC_SIGNATURE_ENCODINGS = ['der', 'ieee-p1363'] as const;

const verificationKeys = ({
  publicKey,
  algorithm
}: {
  publicKey: KeyObject;
  algorithm: SignatureAlgorithm;
}): VerifyKeyObjectInput[] => {
  if (algorithm.keyType === 'ec') {
    return EC_SIGNATURE_ENCODINGS.map(dsaEncoding => ({key: publicKey, dsaEncoding}));
  }

  if (algorithm.padding === 'pss') {
    return [{key: publicKey, padding: constants.RSA_PKCS1_PSS_PADDING, saltLength: constants.RSA_PSS_SALTLEN_DIGEST}];
  }

  return [{key: publicKey}];
};

const verifySignature = ({
  directory,
  certificate
}: {
  directory: ConfigurationDirectory;
  certificate: SigningCertificate;
}): GlobalconfResult<true> => {
  const algorithm = signatureAlgorithmFor(directory.signature.algorithmId);
  if (!algorithm) {
    return err('trust_error', `Unsupported signature algorithm: ${directory.signature.algorithmId}`);
  }

  if (!keyTypeMatches({publicKey: certificate.publicKey, algorithm})) {
    return err('trust_error', `Signature algorithm ${directory.signature.algorithmId} does not fit the signing key`);
  }

  let valid: boolean;
  try {
    valid = verificationKeys({publicKey: certificate.publicKey, algorithm}).some(key =>
      verify(algorithm.digest, directory.signedData, key, directory.signature.value)
    );
  } catch (unknownError) {
    const reason = unknownError instanceof Error ? unknownError.message : String(unknownError);
    return err('trust_error', `Directory signature could not be checked: ${reason}`);
  }

  return valid ? ok(true) : err('trust_error', `Directory signature does not verify against ${certificate.subject}`);
};

const verifyDigest = (part: ConfigurationPart): GlobalconfResult<true> => {
  const digestName = digestNameFor(part.digestAlgorithm);
  if (!digestName) {
    return err('format_error', `Unsupported digest algorithm for ${part.contentIdentifier}: ${part.digestAlgorithm}`);
  }

  const expected = decodeBase64(part.digestValue);
  const actual = createHash(digestName).update(part.rawBytes).digest();
  if (!expected || !actual.equals(expected)) {
    return err(
      'integrity_error',
      `Digest mismatch for ${part.contentIdentifier} (instance ${part.instanceId}, ${part.location})`
    );
  }

  return ok(true);
};

const isListed = ({part, directory}: {part: ConfigurationPart; directory: ConfigurationDirectory}) =>
  directory.entries.some(
    entry =>
      entry.contentIdentifier === part.contentIdentifier &&
      entry.instanceId === part.instanceId &&
      entry.location === part.location &&
      entry.digestAlgorithm === part.digestAlgorithm &&
      entry.digestValue === part.digestValue &&
      entry.expirationTime.getTime() === part.expirationTime.getTime()
  );

const freezePart = ({part, now}: {part: ConfigurationPart; now: Date}): VerifiedConfigurationPart => {
  const verified: VerifiedConfigurationPart = Object.freeze({
    ...part,
    stale: part.expirationTime.getTime() <= now.getTime()
  });
  verifiedParts.add(verified);
  return verified;
};

/**
 * Checks the directory signature against the anchor and every part's digest. Parts past their
 * expiration are kept and flagged as stale.
 */
export const verifyConfiguration = ({
  anchor,
  directory,
  parts,
  now = new Date(),
  logger = createNoopLogger()
}: {
  anchor: ConfigurationAnchor;
  directory: ConfigurationDirectory;
  parts: readonly ConfigurationPart[];
  now?: Date;
  logger?: StructuredLogger;
}): GlobalconfResult<VerifiedConfiguration> => {
  const certificate = findSigningCertificate({anchor, directory});
  if (!certificate.ok) return certificate;

  const signature = verifySignature({directory, certificate: certificate.value});
  if (!signature.ok) return signature;

  if (!parts.some(part => part.instanceId === anchor.instanceIdentifier)) {
    return err('trust_error', `Configuration carries no parts for anchor instance ${anchor.instanceIdentifier}`);
  }

  for (const part of parts) {
    if (!isListed({part, directory})) {
      return err('trust_error', `${part.contentIdentifier} at ${part.location} is not listed in the signed directory`);
    }

    const digest = verifyDigest(part);
    if (!digest.ok) return digest;
  }

  const verifiedPartList = parts.map(part => freezePart({part, now}));
  for (const part of verifiedPartList) {
    if (part.stale) {
      logger.warn({
        event: 'globalconf.part.stale',
        component: COMPONENT,
        instance: part.instanceId,
        message: `${part.contentIdentifier} expired at ${part.expirationTime.toISOString()}`
      });
    }
  }

  return ok(
    Object.freeze({
      instanceIdentifier: anchor.instanceIdentifier,
      sourceUrl: directory.sourceUrl,
      version: directory.version,
      expirationTime: directory.expirationTime,
      stale: directory.expirationTime.getTime() <= now.getTime(),
      parts: Object.freeze(verifiedPartList)
    })
  );
};
