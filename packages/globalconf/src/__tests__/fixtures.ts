import {createHash, createPrivateKey, sign, webcrypto, type KeyObject} from 'node:crypto';

import * as x509 from '@peculiar/x509';
import type {HttpRequestImpl, TransportError} from '@xrdinfo/transport';
import JSZip from 'jszip';

import {DIGEST_ALGORITHM_IDS, digestNameFor, SIGNATURE_ALGORITHM_IDS} from '../algorithms';
import {createConfigurationAnchor} from '../anchor';
import type {ConfigurationAnchor, ConfigurationDirectory, ConfigurationPart, VerifiedConfiguration} from '../contracts';
import {parseConfigurationDirectory} from '../directory';
import {verifyConfiguration} from '../verifier';

export type SigningIdentity = {
  certDer: Buffer;
  privateKey: KeyObject;
};

export const createSigningIdentity = async (
  commonName = 'Test Central Server',
  keyType: 'rsa' | 'ec' = 'rsa'
): Promise<SigningIdentity> => {
  const keys =
    keyType === 'ec'
      ? await webcrypto.subtle.generateKey({name: 'ECDSA', namedCurve: 'P-256'}, true, ['sign', 'verify'])
      : await webcrypto.subtle.generateKey(
          {
            name: 'RSASSA-PKCS1-v1_5',
            modulusLength: 2048,
            publicExponent: new Uint8Array([1, 0, 1]),
            hash: 'SHA-256'
          },
          true,
          ['sign', 'verify']
        );

  const certificate = await x509.X509CertificateGenerator.createSelfSigned({
    name: `CN=${commonName}`,
    keys,
    ...(keyType === 'ec' ? {signingAlgorithm: {name: 'ECDSA', hash: 'SHA-256'}} : {}),
    notBefore: new Date('2026-01-01T00:00:00.000Z'),
    notAfter: new Date('2036-01-01T00:00:00.000Z'),
    extensions: [new x509.KeyUsagesExtension(x509.KeyUsageFlags.digitalSignature, true)]
  });

  const privateKeyDer = await webcrypto.subtle.exportKey('pkcs8', keys.privateKey);

  return {
    certDer: Buffer.from(certificate.rawData),
    privateKey: createPrivateKey({key: Buffer.from(privateKeyDer), format: 'der', type: 'pkcs8'})
  };
};

export const SOURCE_URL = 'http://cs.example.test/internalconf';
export const BACKUP_SOURCE_URL = 'http://backup.example.test/internalconf';

export const sharedParamsXml = (instance = 'EE', subsystemExtras = '') =>
  `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<tns:conf xmlns:id="http://x-road.eu/xsd/identifiers" xmlns:tns="http://x-road.eu/xsd/xroad.xsd">
  <instanceIdentifier>${instance}</instanceIdentifier>
  <member id="m1">
    <memberClass><code>GOV</code><description>Government</description></memberClass>
    <memberCode>70000310</memberCode>
    <name>Test Agency</name>
    <subsystem id="s1"><subsystemCode>registry</subsystemCode>${subsystemExtras}</subsystem>
    <subsystem id="s2"><subsystemCode>Sub/ä</subsystemCode></subsystem>
  </member>
  <member id="m2">
    <memberClass><code>COM</code><description>Commercial</description></memberClass>
    <memberCode>12345678</memberCode>
    <name>Example Company &amp; Co</name>
    <subsystem id="s3"><subsystemCode>portal</subsystemCode></subsystem>
  </member>
  <securityServer>
    <owner>m1</owner>
    <serverCode>ss1</serverCode>
    <address>ss1.example.test</address>
    <client>m1</client>
    <client>s1</client>
    <client>s2</client>
  </securityServer>
  <securityServer>
    <owner>m2</owner>
    <serverCode>ss2</serverCode>
    <address>ss2.example.test</address>
    <client>s1</client>
  </securityServer>
  <globalGroup>
    <groupCode>security-server-owners</groupCode>
    <description>Security server owners</description>
    <groupMember id:objectType="MEMBER">
      <id:xRoadInstance>${instance}</id:xRoadInstance>
      <id:memberClass>GOV</id:memberClass>
      <id:memberCode>70000310</id:memberCode>
    </groupMember>
    <groupMember id:objectType="SUBSYSTEM">
      <id:xRoadInstance>${instance}</id:xRoadInstance>
      <id:memberClass>COM</id:memberClass>
      <id:memberCode>12345678</id:memberCode>
      <id:subsystemCode>portal</id:subsystemCode>
    </groupMember>
  </globalGroup>
  <centralService>
    <serviceCode>populationRegister</serviceCode>
    <implementingService id:objectType="SERVICE">
      <id:xRoadInstance>${instance}</id:xRoadInstance>
      <id:memberClass>GOV</id:memberClass>
      <id:memberCode>70000310</id:memberCode>
      <id:subsystemCode>registry</id:subsystemCode>
      <id:serviceCode>getPerson</id:serviceCode>
      <id:serviceVersion>v1</id:serviceVersion>
    </implementingService>
  </centralService>
  <globalSettings>
    <memberClass><code>GOV</code><description>Government</description></memberClass>
    <memberClass><code>COM</code><description>Commercial</description></memberClass>
    <ocspFreshnessSeconds>600</ocspFreshnessSeconds>
  </globalSettings>
</tns:conf>
`;

/** ZIP archive laid out the way a security server serves its verificationconf. */
export const verificationArchive = async (files: Record<string, string>): Promise<Buffer> => {
  const archive = new JSZip();
  for (const [name, content] of Object.entries(files)) {
    archive.file(name, content);
  }

  return archive.generateAsync({type: 'nodebuffer'});
};

export const privateParamsXml = (instance = 'EE') =>
  `<?xml version="1.0" encoding="UTF-8"?>
<tns:conf xmlns:tns="http://x-road.eu/xsd/xroad.xsd">
  <instanceIdentifier>${instance}</instanceIdentifier>
  <timeStampingIntervalSeconds>60</timeStampingIntervalSeconds>
</tns:conf>
`;

export type BundlePart = {
  contentIdentifier: string;
  instance: string;
  location: string;
  content: Buffer;
  expireDate?: string;
};

export type Bundle = {
  directoryBody: Buffer;
  contentType: string;
  signedData: Buffer;
  files: Map<string, Buffer>;
};

export const defaultParts = (instance = 'EE'): BundlePart[] => [
  {
    contentIdentifier: 'PRIVATE-PARAMETERS',
    instance,
    location: '/V2/20260301120000000000000/private-params.xml',
    content: Buffer.from(privateParamsXml(instance), 'utf8')
  },
  {
    contentIdentifier: 'SHARED-PARAMETERS',
    instance,
    location: '/V2/20260301120000000000000/shared-params.xml',
    content: Buffer.from(sharedParamsXml(instance), 'utf8')
  }
];

const INNER_BOUNDARY = 'innerb4a7e';
const OUTER_BOUNDARY = 'outerc91d3';

/**
 * Builds a signed configuration directory the way a central server publishes it, plus the
 * part files it points at, keyed by absolute URL.
 */
export const buildBundle = ({
  signer,
  parts = defaultParts(),
  sourceUrl = SOURCE_URL,
  expireDate = '2026-03-02T12:00:00Z',
  version = 2,
  signatureAlgorithmId = SIGNATURE_ALGORITHM_IDS.rsaSha256,
  digestAlgorithmId = DIGEST_ALGORITHM_IDS.sha512,
  ecSignatureEncoding
}: {
  signer: SigningIdentity;
  parts?: BundlePart[];
  sourceUrl?: string;
  expireDate?: string;
  version?: number;
  signatureAlgorithmId?: string;
  digestAlgorithmId?: string;
  ecSignatureEncoding?: 'der' | 'ieee-p1363';
}): Bundle => {
  const entries = parts.map(part =>
    [
      `--${INNER_BOUNDARY}`,
      'Content-type: application/octet-stream',
      'Content-transfer-encoding: base64',
      `Content-identifier: ${part.contentIdentifier}; instance="${part.instance}"`,
      `Content-location: ${part.location}`,
      `Hash-algorithm-id: ${digestAlgorithmId}`,
      ...(part.expireDate ? [`Expire-date: ${part.expireDate}`] : []),
      '',
      createHash(digestNameFor(digestAlgorithmId) ?? 'sha512')
        .update(part.content)
        .digest('base64')
    ].join('\r\n')
  );

  const signedData = Buffer.from(
    [
      `Content-type: multipart/mixed; charset=UTF-8; boundary=${INNER_BOUNDARY}`,
      '',
      `--${INNER_BOUNDARY}`,
      `Expire-date: ${expireDate}`,
      `Version: ${version}`,
      '',
      ...entries,
      `--${INNER_BOUNDARY}--`
    ].join('\r\n'),
    'utf8'
  );

  const signature = sign(
    'sha256',
    signedData,
    ecSignatureEncoding ? {key: signer.privateKey, dsaEncoding: ecSignatureEncoding} : signer.privateKey
  );
  const certHash = createHash('sha512').update(signer.certDer).digest('base64');

  const directoryBody = Buffer.concat([
    Buffer.from(`--${OUTER_BOUNDARY}\r\n`, 'utf8'),
    signedData,
    Buffer.from(
      [
        '',
        `--${OUTER_BOUNDARY}`,
        'Content-type: application/octet-stream',
        'Content-transfer-encoding: base64',
        `Signature-algorithm-id: ${signatureAlgorithmId}`,
        `Verification-certificate-hash: ${certHash}; hash-algorithm-id="${DIGEST_ALGORITHM_IDS.sha512}"`,
        '',
        signature.toString('base64'),
        `--${OUTER_BOUNDARY}--`,
        ''
      ].join('\r\n'),
      'utf8'
    )
  ]);

  const files = new Map<string, Buffer>();
  for (const part of parts) {
    files.set(new URL(part.location, sourceUrl).toString(), part.content);
  }

  return {
    directoryBody,
    contentType: `multipart/related; charset=UTF-8; boundary=${OUTER_BOUNDARY}`,
    signedData,
    files
  };
};

export const anchorXml = ({
  instance = 'EE',
  sources
}: {
  instance?: string;
  sources: Array<{url: string; certs: Buffer[]}>;
}) =>
  `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<tns:configurationAnchor xmlns:tns="http://x-road.eu/xsd/xroad.xsd">
  <generatedAt>2026-03-01T10:00:00.000Z</generatedAt>
  <instanceIdentifier>${instance}</instanceIdentifier>
${sources
  .map(
    source => `  <source>
    <downloadURL>${source.url}</downloadURL>
${source.certs.map(cert => `    <verificationCert>${cert.toString('base64')}</verificationCert>`).join('\n')}
  </source>`
  )
  .join('\n')}
</tns:configurationAnchor>
`;

export type FakeRoute =
  | {status?: number; body: Buffer | string; headers?: Record<string, string>}
  | {error: TransportError};

/** In-process stand-in for the HTTP client, answering from a URL-keyed route table. */
export const createFakeRequest = (routes: Map<string, FakeRoute>) => {
  const calls: string[] = [];
  const requestImpl: HttpRequestImpl = async request => {
    calls.push(request.url);
    const route = routes.get(request.url);
    if (!route) {
      return {ok: false, error: {code: 'network_error', message: `ECONNREFUSED: ${request.url}`}};
    }

    if ('error' in route) {
      return {ok: false, error: route.error};
    }

    return {
      ok: true,
      value: {
        status: route.status ?? 200,
        headers: route.headers ?? {},
        body: typeof route.body === 'string' ? Buffer.from(route.body, 'utf8') : route.body
      }
    };
  };

  return {calls, requestImpl};
};

export const bundleRoutes = ({bundle, sourceUrl = SOURCE_URL}: {bundle: Bundle; sourceUrl?: string}) => {
  const routes = new Map<string, FakeRoute>([
    [sourceUrl, {body: bundle.directoryBody, headers: {'content-type': bundle.contentType}}]
  ]);
  for (const [url, content] of bundle.files) {
    routes.set(url, {body: content});
  }

  return routes;
};

export const anchorFor = ({
  certs,
  instanceIdentifier = 'EE',
  urls = [SOURCE_URL]
}: {
  certs: Buffer[];
  instanceIdentifier?: string;
  urls?: string[];
}): ConfigurationAnchor => {
  const anchor = createConfigurationAnchor({
    instanceIdentifier,
    sources: urls.map(downloadUrl => ({downloadUrl, verificationCerts: certs}))
  });
  if (!anchor.ok) throw new Error(anchor.error.message);
  return anchor.value;
};

export const directoryOf = (bundle: Bundle, sourceUrl = SOURCE_URL): ConfigurationDirectory => {
  const parsed = parseConfigurationDirectory({body: bundle.directoryBody, sourceUrl});
  if (!parsed.ok) throw new Error(parsed.error.message);
  return parsed.value;
};

/** Pairs each directory entry with its file from the bundle, as a download would. */
export const partsOf = ({
  bundle,
  directory
}: {
  bundle: Bundle;
  directory: ConfigurationDirectory;
}): ConfigurationPart[] =>
  directory.entries.map(entry => ({
    contentIdentifier: entry.contentIdentifier,
    instanceId: entry.instanceId,
    location: entry.location,
    expirationTime: entry.expirationTime,
    digestAlgorithm: entry.digestAlgorithm,
    digestValue: entry.digestValue,
    formatVersion: directory.version,
    rawBytes: bundle.files.get(new URL(entry.location, directory.sourceUrl).toString()) ?? Buffer.alloc(0)
  }));

export const verifiedBundle = ({
  signer,
  parts,
  version
}: {
  signer: SigningIdentity;
  parts?: BundlePart[];
  version?: number;
}): VerifiedConfiguration => {
  const bundle = buildBundle({signer, ...(parts ? {parts} : {}), ...(version !== undefined ? {version} : {})});
  const directory = directoryOf(bundle);
  const verified = verifyConfiguration({
    anchor: anchorFor({certs: [signer.certDer]}),
    directory,
    parts: partsOf({bundle, directory}),
    now: new Date('2026-03-01T12:30:00.000Z')
  });
  if (!verified.ok) throw new Error(verified.error.message);
  return verified.value;
};

/** Captures logger output lines per stream. */
export const createBufferedWriter = () => {
  const stdout: string[] = [];
  const stderr: string[] = [];

  return {
    stdout,
    stderr,
    writer: {
      stdout: {
        write: (chunk: string | Uint8Array) => {
          stdout.push(String(chunk).trim());
          return true;
        }
      },
      stderr: {
        write: (chunk: string | Uint8Array) => {
          stderr.push(String(chunk).trim());
          return true;
        }
      }
    }
  };
};
