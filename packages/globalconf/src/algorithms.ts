export type DigestName = 'sha1' | 'sha256' | 'sha384' | 'sha512';

export type SignatureAlgorithm = {
  digest: DigestName;
  keyType: 'rsa' | 'ec';
  padding: 'pkcs1' | 'pss';
};

const DIGEST_ALGORITHMS: Readonly<Record<string, DigestName>> = {
  'http://www.w3.org/2000/09/xmldsig#sha1': 'sha1',
  'http://www.w3.org/2001/04/xmlenc#sha256': 'sha256',
  'http://www.w3.org/2001/04/xmldsig-more#sha384': 'sha384',
  'http://www.w3.org/2001/04/xmlenc#sha384': 'sha384',
  'http://www.w3.org/2001/04/xmlenc#sha512': 'sha512'
};

const SIGNATURE_ALGORITHMS: Readonly<Record<string, SignatureAlgorithm>> = {
  'http://www.w3.org/2000/09/xmldsig#rsa-sha1': {digest: 'sha1', keyType: 'rsa', padding: 'pkcs1'},
  'http://www.w3.org/2001/04/xmldsig-more#rsa-sha256': {digest: 'sha256', keyType: 'rsa', padding: 'pkcs1'},
  'http://www.w3.org/2001/04/xmldsig-more#rsa-sha384': {digest: 'sha384', keyType: 'rsa', padding: 'pkcs1'},
  'http://www.w3.org/2001/04/xmldsig-more#rsa-sha512': {digest: 'sha512', keyType: 'rsa', padding: 'pkcs1'},
  'http://www.w3.org/2007/05/xmldsig-more#sha256-rsa-MGF1': {digest: 'sha256', keyType: 'rsa', padding: 'pss'},
  'http://www.w3.org/2007/05/xmldsig-more#sha512-rsa-MGF1': {digest: 'sha512', keyType: 'rsa', padding: 'pss'},
  'http://www.w3.org/2001/04/xmldsig-more#ecdsa-sha256': {digest: 'sha256', keyType: 'ec', padding: 'pkcs1'},
  'http://www.w3.org/2001/04/xmldsig-more#ecdsa-sha384': {digest: 'sha384', keyType: 'ec', padding: 'pkcs1'},
  'http://www.w3.org/2001/04/xmldsig-more#ecdsa-sha512': {digest: 'sha512', keyType: 'ec', padding: 'pkcs1'}
};

export const DIGEST_ALGORITHM_IDS = {
  sha1: 'http://www.w3.org/2000/09/xmldsig#sha1',
  sha256: 'http://www.w3.org/2001/04/xmlenc#sha256',
  sha384: 'http://www.w3.org/2001/04/xmldsig-more#sha384',
  sha512: 'http://www.w3.org/2001/04/xmlenc#sha512'
} as const satisfies Record<DigestName, string>;

export const SIGNATURE_ALGORITHM_IDS = {
  rsaSha256: 'http://www.w3.org/2001/04/xmldsig-more#rsa-sha256',
  rsaSha512: 'http://www.w3.org/2001/04/xmldsig-more#rsa-sha512',
  ecdsaSha256: 'http://www.w3.org/2001/04/xmldsig-more#ecdsa-sha256'
} as const;

export const digestNameFor = (algorithmId: string): DigestName | undefined =>
  Object.hasOwn(DIGEST_ALGORITHMS, algorithmId) ? DIGEST_ALGORITHMS[algorithmId] : undefined;

export const signatureAlgorithmFor = (algorithmId: string): SignatureAlgorithm | undefined =>
  Object.hasOwn(SIGNATURE_ALGORITHMS, algorithmId) ? SIGNATURE_ALGORITHMS[algorithmId] : undefined;
