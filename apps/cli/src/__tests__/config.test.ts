import {describe, expect, it} from 'vitest';

import {parseCommandLine} from '../config';

describe('parseCommandLine', () => {
  it('reads settings from the environment', () => {
    const parsed = parseCommandLine({
      argv: ['members'],
      env: {
        XRDINFO_ANCHOR: '/etc/xrdinfo/anchor.xml',
        XRDINFO_INSTANCE: 'EE',
        XRDINFO_TIMEOUT_MS: '7000',
        XRDINFO_LOG_LEVEL: 'debug',
        HOME: '/root'
      }
    });

    expect(parsed).toEqual({
      ok: true,
      value: {
        kind: 'run',
        config: {
          command: 'members',
          args: [],
          anchorPath: '/etc/xrdinfo/anchor.xml',
          instance: 'EE',
          timeoutMs: 7000,
          threads: 1,
          tls: {},
          logging: {level: 'debug'},
          flags: {
            rest: false,
            allowed: false,
            registered: false,
            withServers: false,
            operations: false,
            endpoints: false,
            status: false,
            all: false
          }
        }
      }
    });
  });

  it('lets flags override the environment', () => {
    const parsed = parseCommandLine({
      argv: ['methods', '--gateway', 'http://flag.example.test', '-t', '2500', '--rest', 'EE/GOV/1/a', 'EE/COM/2/b'],
      env: {XRDINFO_GATEWAY_URL: 'http://env.example.test', XRDINFO_TIMEOUT_MS: '9000'}
    });

    expect(parsed.ok && parsed.value.kind === 'run' ? parsed.value.config : undefined).toMatchObject({
      command: 'methods',
      args: ['EE/GOV/1/a', 'EE/COM/2/b'],
      gatewayUrl: 'http://flag.example.test',
      timeoutMs: 2500,
      logging: {level: 'silent'},
      flags: {rest: true, allowed: false}
    });
  });

  it('reads sweep settings', () => {
    const parsed = parseCommandLine({
      argv: ['wsdl', '--all', '--threads', '4', '--conf-server', 'ss.example.test', 'EE/GOV/1/a'],
      env: {XRDINFO_THREADS: '2', XRDINFO_CONF_SERVER: 'env.example.test'}
    });

    expect(parsed.ok && parsed.value.kind === 'run' ? parsed.value.config : undefined).toMatchObject({
      command: 'wsdl',
      args: ['EE/GOV/1/a'],
      confServer: 'ss.example.test',
      threads: 4,
      flags: {all: true}
    });
  });

  it('rejects a thread count that is not positive', () => {
    const parsed = parseCommandLine({argv: ['methods', '--all', '--threads', '0', 'EE/GOV/1/a'], env: {}});

    expect(parsed.ok ? undefined : parsed.error.message).toMatch(/^Invalid option: threads: /u);
  });

  it('collects TLS settings', () => {
    const parsed = parseCommandLine({
      argv: ['servers', '--cert', 'client.pem', '--key', 'client.key', '--no-verify'],
      env: {XRDINFO_TLS_CA: '/etc/ssl/ca.pem', XRDINFO_TLS_VERIFY: 'true'}
    });

    expect(parsed.ok && parsed.value.kind === 'run' ? parsed.value.config.tls : undefined).toEqual({
      certPath: 'client.pem',
      keyPath: 'client.key',
      caPath: '/etc/ssl/ca.pem',
      rejectUnauthorized: false
    });
  });

  it('asks for help without a command', () => {
    expect(parseCommandLine({argv: [], env: {}})).toEqual({ok: true, value: {kind: 'help'}});
    expect(parseCommandLine({argv: ['servers', '--help'], env: {}})).toEqual({ok: true, value: {kind: 'help'}});
  });

  it('rejects an unknown command', () => {
    expect(parseCommandLine({argv: ['frobnicate'], env: {}})).toEqual({
      ok: false,
      error: {code: 'usage_error', message: 'Unknown command: frobnicate'}
    });
  });

  it('rejects an unknown flag', () => {
    const parsed = parseCommandLine({argv: ['members', '--bogus'], env: {}});

    expect(parsed.ok ? undefined : parsed.error.code).toBe('usage_error');
  });

  it('rejects an invalid log level flag', () => {
    const parsed = parseCommandLine({argv: ['members', '--log-level', 'loud'], env: {}});

    expect(parsed.ok ? undefined : parsed.error.code).toBe('usage_error');
    expect(parsed.ok ? undefined : parsed.error.message).toMatch(/^Invalid option: logLevel: /u);
  });

  it('rejects an invalid environment value', () => {
    expect(parseCommandLine({argv: ['members'], env: {XRDINFO_TIMEOUT_MS: 'soon'}})).toEqual({
      ok: false,
      error: {code: 'config_error', message: 'Invalid environment: XRDINFO_TIMEOUT_MS: Expected number, received string'}
    });
  });
});
