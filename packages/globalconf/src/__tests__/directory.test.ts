import {beforeAll, describe, expect, it} from 'vitest';

import {DIGEST_ALGORITHM_IDS, parseConfigurationDirectory} from '../index';
import {buildBundle, createSigningIdentity, SOURCE_URL, type SigningIdentity} from './fixtures';

describe('parseConfigurationDirectory', () => {
  let signer: SigningIdentity;

  beforeAll(async () => {
    signer = await createSigningIdentity();
  });

  it('lists every entry with its instance, location and digest', () => {
    const bundle = buildBundle({signer});

    const parsed = parseConfigurationDirectory({
      body: bundle.directoryBody,
      contentType: bundle.contentType,
      sourceUrl: SOURCE_URL
    });

    expect(parsed.ok).toBe(true);
    if (!parsed.ok) return;
    expect(parsed.value.version).toBe(2);
    expect(parsed.value.expirationTime.toISOString()).toBe('2026-03-02T12:00:00.000Z');
    expect(parsed.value.entries.map(entry => [entry.contentIdentifier, entry.instanceId, entry.location])).toEqual([
      ['PRIVATE-PARAMETERS', 'EE', '/V2/20260301120000000000000/private-params.xml'],
      ['SHARED-PARAMETERS', 'EE', '/V2/20260301120000000000000/shared-params.xml']
    ]);
    expect(parsed.value.entries[0]?.digestAlgorithm).toBe(DIGEST_ALGORITHM_IDS.sha512);
    expect(parsed.value.signedData.equals(bundle.signedData)).toBe(true);
    expect(parsed.value.signature.verificationCertHashAlgorithm).toBe(DIGEST_ALGORITHM_IDS.sha512);
  });

  it('points each entry range at its raw bytes', () => {
    const bundle = buildBundle({signer});

    const parsed = parseConfigurationDirectory({body: bundle.directoryBody, sourceUrl: SOURCE_URL});

    expect(parsed.ok).toBe(true);
    if (!parsed.ok) return;
    const entry = parsed.value.entries[1];
    const text = entry ? bundle.directoryBody.subarray(entry.range.start, entry.range.end).toString('utf8') : '';
    expect(text.startsWith('Content-type: application/octet-stream\r\n')).toBe(true);
    expect(text.endsWith(entry?.digestValue ?? '-')).toBe(true);
  });

  it('finds the boundary in the body when no content type is given', () => {
    const bundle = buildBundle({signer});

    const parsed = parseConfigurationDirectory({body: bundle.directoryBody, sourceUrl: SOURCE_URL});

    expect(parsed.ok ? parsed.value.entries.length : 0).toBe(2);
  });

  it('applies a per-entry expiration over the directory one', () => {
    const bundle = buildBundle({
      signer,
      parts: [
        {
          contentIdentifier: 'SHARED-PARAMETERS',
          instance: 'EE',
          location: '/V2/shared-params.xml',
          content: Buffer.from('<conf/>'),
          expireDate: '2026-02-01T00:00:00Z'
        }
      ]
    });

    const parsed = parseConfigurationDirectory({body: bundle.directoryBody, sourceUrl: SOURCE_URL});

    expect(parsed.ok ? parsed.value.entries[0]?.expirationTime.toISOString() : undefined).toBe('2026-02-01T00:00:00.000Z');
  });

  it('fails on a body without boundary markers', () => {
    const parsed = parseConfigurationDirectory({body: Buffer.from('<html>maintenance</html>'), sourceUrl: SOURCE_URL});

    expect(parsed).toEqual({
      ok: false,
      error: {code: 'format_error', message: 'Configuration directory: Multipart boundary is missing'}
    });
  });

  it('fails when an entry lacks its content location', () => {
    const bundle = buildBundle({signer});
    const body = Buffer.from(bundle.directoryBody.toString('utf8').replace(/Content-location: [^\r]+\r\n/u, ''), 'utf8');

    const parsed = parseConfigurationDirectory({body, sourceUrl: SOURCE_URL});

    expect(parsed).toEqual({
      ok: false,
      error: {code: 'format_error', message: 'Directory entry 1 is missing the content-location header'}
    });
  });

  it('fails when the signature part lacks its algorithm', () => {
    const bundle = buildBundle({signer});
    const body = Buffer.from(bundle.directoryBody.toString('utf8').replace(/Signature-algorithm-id: [^\r]+\r\n/u, ''), 'utf8');

    const parsed = parseConfigurationDirectory({body, sourceUrl: SOURCE_URL});

    expect(parsed).toEqual({
      ok: false,
      error: {code: 'format_error', message: 'Directory signature part is missing the signature-algorithm-id header'}
    });
  });

  it('fails when the listing has no version', () => {
    const bundle = buildBundle({signer});
    const body = Buffer.from(bundle.directoryBody.toString('utf8').replace('Version: 2\r\n', ''), 'utf8');

    const parsed = parseConfigurationDirectory({body, sourceUrl: SOURCE_URL});

    expect(parsed).toEqual({
      ok: false,
      error: {code: 'format_error', message: 'Directory listing is missing the version header'}
    });
  });

  it('fails when the signature part is missing', () => {
    const text = buildBundle({signer}).directoryBody.toString('utf8');
    const signatureStart = text.indexOf('\r\n--outerc91d3\r\n');
    const body = Buffer.from(`${text.slice(0, signatureStart)}\r\n--outerc91d3--\r\n`, 'utf8');

    const parsed = parseConfigurationDirectory({body, sourceUrl: SOURCE_URL});

    expect(parsed).toEqual({
      ok: false,
      error: {code: 'format_error', message: 'Configuration directory needs a signed-data part and a signature part'}
    });
  });
});
