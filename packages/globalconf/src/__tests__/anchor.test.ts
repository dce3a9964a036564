import {beforeAll, describe, expect, it} from 'vitest';

import {createConfigurationAnchor, parseConfigurationAnchor} from '../index';
import {anchorXml, BACKUP_SOURCE_URL, createSigningIdentity, SOURCE_URL, type SigningIdentity} from './fixtures';

describe('configuration anchor', () => {
  let identity: SigningIdentity;

  beforeAll(async () => {
    identity = await createSigningIdentity();
  });

  it('reads instance, sources and certificates in document order', () => {
    const parsed = parseConfigurationAnchor(
      anchorXml({
        sources: [
          {url: SOURCE_URL, certs: [identity.certDer]},
          {url: BACKUP_SOURCE_URL, certs: [identity.certDer, Buffer.from('second-cert')]}
        ]
      })
    );

    expect(parsed.ok).toBe(true);
    if (!parsed.ok) return;
    expect(parsed.value.instanceIdentifier).toBe('EE');
    expect(parsed.value.generatedAt?.toISOString()).toBe('2026-03-01T10:00:00.000Z');
    expect(parsed.value.sources.map(source => source.downloadUrl)).toEqual([SOURCE_URL, BACKUP_SOURCE_URL]);
    expect(parsed.value.sources[0]?.verificationCerts[0]?.equals(identity.certDer)).toBe(true);
    expect(parsed.value.sources[1]?.verificationCerts[1]?.toString('utf8')).toBe('second-cert');
  });

  it('accepts the anchor as bytes', () => {
    const parsed = parseConfigurationAnchor(
      Buffer.from(anchorXml({instance: 'FI', sources: [{url: SOURCE_URL, certs: [identity.certDer]}]}), 'utf8')
    );

    expect(parsed.ok ? parsed.value.instanceIdentifier : undefined).toBe('FI');
  });

  it('rejects malformed XML', () => {
    const parsed = parseConfigurationAnchor('<configurationAnchor><instanceIdentifier>EE</configurationAnchor>');

    expect(parsed.ok).toBe(false);
    if (!parsed.ok) {
      expect(parsed.error.code).toBe('format_error');
    }
  });

  it('rejects an anchor without sources', () => {
    const parsed = parseConfigurationAnchor(anchorXml({sources: []}));

    expect(parsed.ok).toBe(false);
    if (!parsed.ok) {
      expect(parsed.error.code).toBe('format_error');
      expect(parsed.error.message).toContain('source');
    }
  });

  it('rejects certificates that are not base64', () => {
    const xml = anchorXml({sources: [{url: SOURCE_URL, certs: [identity.certDer]}]}).replace(
      /<verificationCert>[^<]+<\/verificationCert>/u,
      '<verificationCert>not*base64</verificationCert>'
    );

    const parsed = parseConfigurationAnchor(xml);

    expect(parsed.ok).toBe(false);
    if (!parsed.ok) {
      expect(parsed.error.message).toContain('Invalid base64 content');
    }
  });

  it('validates directly constructed anchors', () => {
    expect(createConfigurationAnchor({instanceIdentifier: 'EE', sources: []}).ok).toBe(false);
    expect(
      createConfigurationAnchor({instanceIdentifier: 'EE', sources: [{downloadUrl: SOURCE_URL, verificationCerts: [identity.certDer]}]})
        .ok
    ).toBe(true);
  });
});
