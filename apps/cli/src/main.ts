import {createStructuredLogger} from '@xrdinfo/logging';

import {appName, runCli} from './index';

const main = async () => {
  process.exitCode = await runCli({
    argv: process.argv.slice(2),
    env: process.env,
    stdout: process.stdout,
    stderr: process.stderr
  });
};

void main().catch(error => {
  const logger = createStructuredLogger({service: appName, env: 'cli', level: 'error'});
  logger.fatal({
    event: 'process.command.crashed',
    component: 'process.entrypoint',
    message: 'xrdinfo terminated unexpectedly',
    reason_code: 'unexpected_error',
    metadata: {error}
  });
  process.exitCode = 1;
});
