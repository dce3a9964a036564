import {readFile} from 'node:fs/promises';
import type {Writable} from 'node:stream';

import type {HostResolver} from '@xrdinfo/globalconf';
import {createStructuredLogger, withLogContext} from '@xrdinfo/logging';
import {loadTlsCredentials, type HttpRequestImpl} from '@xrdinfo/transport';

import {runCommand} from './commands';
import {parseCommandLine, usage} from './config';
import type {CommandError} from './errors';

export const appName = 'xrdinfo';

export type CliIo = {
  argv: string[];
  env: Record<string, string | undefined>;
  stdout: Pick<Writable, 'write'>;
  stderr: Pick<Writable, 'write'>;
  readFile?: (path: string) => Promise<Buffer>;
  requestImpl?: HttpRequestImpl;
  hostResolver?: HostResolver;
  now?: () => Date;
};

const reportError = (io: CliIo, error: CommandError) => {
  io.stderr.write(`${appName}: ${error.message}\n`);
};

/**
 * Runs one command and resolves to the process exit code. Results go to stdout as
 * tab-separated lines; errors and log lines go to stderr.
 */
export const runCli = async (io: CliIo): Promise<number> => {
  const parsed = parseCommandLine({argv: io.argv, env: io.env});
  if (!parsed.ok) {
    reportError(io, parsed.error);
    if (parsed.error.code === 'usage_error') {
      io.stderr.write(usage);
    }
    return 1;
  }

  if (parsed.value.kind === 'help') {
    io.stdout.write(usage);
    return 0;
  }

  const {config} = parsed.value;
  const logger = createStructuredLogger({
    service: appName,
    env: 'cli',
    level: config.logging.level,
    writer: {stdout: io.stderr, stderr: io.stderr}
  });

  const tls = await loadTlsCredentials(config.tls);
  if (!tls.ok) {
    reportError(io, tls.error);
    return 1;
  }

  let problems = 0;
  const result = await withLogContext({operation: config.command}, () =>
    runCommand({
      config,
      logger,
      tls: tls.value,
      readFile: io.readFile ?? (path => readFile(path)),
      now: io.now ?? (() => new Date()),
      reportProblem: message => {
        problems += 1;
        io.stderr.write(`${appName}: ${message}\n`);
      },
      ...(io.requestImpl ? {requestImpl: io.requestImpl} : {}),
      ...(io.hostResolver ? {hostResolver: io.hostResolver} : {})
    })
  );

  if (!result.ok) {
    logger.error({
      event: 'cli.command.failed',
      component: 'cli',
      reason_code: result.error.code,
      message: result.error.message || undefined
    });
    reportError(io, result.error);
    return 1;
  }

  for (const line of result.value) {
    io.stdout.write(`${line}\n`);
  }

  // A sweep prints what it could gather and still fails when any part of it failed.
  return problems > 0 ? 1 : 0;
};
