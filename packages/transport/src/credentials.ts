import {readFile} from 'node:fs/promises';
import * as path from 'node:path';

import {TlsCredentialPathsSchema, type TlsOptions} from './contracts';
import {err, ok, type TransportResult} from './errors';

const readCredentialFile = async (filePath: string): Promise<TransportResult<Buffer>> => {
  try {
    return ok(await readFile(path.resolve(filePath)));
  } catch (unknownError) {
    const reason = unknownError instanceof Error ? unknownError.message : String(unknownError);
    return err('credentials_error', `Failed to read ${filePath}: ${reason}`);
  }
};

/**
 * Loads client certificate, key and trusted CA bundle from disk. A CA bundle turns on peer
 * verification unless `rejectUnauthorized` says otherwise.
 */
export const loadTlsCredentials = async (input: unknown): Promise<TransportResult<TlsOptions | undefined>> => {
  const parsed = TlsCredentialPathsSchema.safeParse(input);
  if (!parsed.success) {
    return err('credentials_error', parsed.error.issues.map(issue => issue.message).join('; '));
  }

  const {certPath, keyPath, caPath, rejectUnauthorized} = parsed.data;
  if (!certPath && !caPath && rejectUnauthorized === undefined) {
    return ok(undefined);
  }

  const options: TlsOptions = {};
  if (certPath && keyPath) {
    const cert = await readCredentialFile(certPath);
    if (!cert.ok) return cert;
    const key = await readCredentialFile(keyPath);
    if (!key.ok) return key;
    options.cert = cert.value;
    options.key = key.value;
  }

  if (caPath) {
    const ca = await readCredentialFile(caPath);
    if (!ca.ok) return ca;
    options.ca = ca.value;
  }

  options.rejectUnauthorized = rejectUnauthorized ?? Boolean(caPath);
  return ok(options);
};
