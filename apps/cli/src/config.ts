import {parseArgs} from 'node:util';

import {LogLevelSchema, type LogLevel} from '@xrdinfo/logging';
import {z} from 'zod';

import {err, ok, type CommandResult} from './errors';

export const commandNames = [
  'members',
  'subsystems',
  'servers',
  'server-ips',
  'methods',
  'wsdl',
  'openapi',
  'expiration'
] as const;

export const CommandNameSchema = z.enum(commandNames);
export type CommandName = z.infer<typeof CommandNameSchema>;

const numberFromEnv = z.preprocess(value => {
  if (typeof value !== 'string' || value.trim().length === 0) {
    return value;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? value : parsed;
}, z.number().int().positive());

const booleanFromEnv = z.preprocess(value => {
  if (typeof value !== 'string') {
    return value;
  }

  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') {
    return true;
  }
  if (normalized === 'false' || normalized === '0') {
    return false;
  }

  return value;
}, z.boolean());

const optionalString = z.preprocess(value => {
  if (typeof value !== 'string') {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}, z.string().optional());

// Unrelated variables in the environment are ignored.
const envSchema = z.object({
  XRDINFO_ANCHOR: optionalString,
  XRDINFO_INSTANCE: optionalString,
  XRDINFO_GATEWAY_URL: optionalString,
  XRDINFO_CONF_SERVER: optionalString,
  XRDINFO_THREADS: numberFromEnv.optional(),
  XRDINFO_TIMEOUT_MS: numberFromEnv.optional(),
  XRDINFO_TLS_CERT: optionalString,
  XRDINFO_TLS_KEY: optionalString,
  XRDINFO_TLS_CA: optionalString,
  XRDINFO_TLS_VERIFY: booleanFromEnv.optional(),
  XRDINFO_USER_ID: optionalString,
  XRDINFO_LOG_LEVEL: LogLevelSchema.optional()
});

const flagOptions = {
  anchor: {type: 'string', short: 'a'},
  instance: {type: 'string', short: 'i'},
  gateway: {type: 'string', short: 's'},
  'conf-server': {type: 'string'},
  threads: {type: 'string'},
  timeout: {type: 'string', short: 't'},
  cert: {type: 'string'},
  key: {type: 'string'},
  ca: {type: 'string'},
  'no-verify': {type: 'boolean'},
  'user-id': {type: 'string'},
  'log-level': {type: 'string'},
  rest: {type: 'boolean'},
  allowed: {type: 'boolean'},
  registered: {type: 'boolean'},
  'with-servers': {type: 'boolean'},
  operations: {type: 'boolean'},
  endpoints: {type: 'boolean'},
  status: {type: 'boolean'},
  all: {type: 'boolean'},
  help: {type: 'boolean', short: 'h'}
} as const;

// Sweeps query one subsystem at a time unless asked otherwise.
export const DEFAULT_THREADS = 1;

export type CliFlags = {
  rest: boolean;
  allowed: boolean;
  registered: boolean;
  withServers: boolean;
  operations: boolean;
  endpoints: boolean;
  status: boolean;
  all: boolean;
};

export type CliConfig = {
  command: CommandName;
  args: string[];
  anchorPath?: string;
  instance?: string;
  gatewayUrl?: string;
  confServer?: string;
  timeoutMs?: number;
  threads: number;
  userId?: string;
  tls: {
    certPath?: string;
    keyPath?: string;
    caPath?: string;
    rejectUnauthorized?: boolean;
  };
  logging: {
    level: LogLevel;
  };
  flags: CliFlags;
};

export type ParsedCommandLine = {kind: 'help'} | {kind: 'run'; config: CliConfig};

const describeIssues = (error: z.ZodError) =>
  error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');

const readArgs = (argv: string[]) => {
  try {
    return ok(parseArgs({args: argv, options: flagOptions, allowPositionals: true, strict: true}));
  } catch (unknownError) {
    return err('usage_error', unknownError instanceof Error ? unknownError.message : String(unknownError));
  }
};

/**
 * Reads the command line and the `XRDINFO_*` environment. Flags take precedence over
 * environment variables.
 */
export const parseCommandLine = ({
  argv,
  env
}: {
  argv: string[];
  env: Record<string, string | undefined>;
}): CommandResult<ParsedCommandLine> => {
  const parsedArgs = readArgs(argv);
  if (!parsedArgs.ok) return parsedArgs;

  const {values, positionals} = parsedArgs.value;
  const [commandText, ...args] = positionals;
  if (values.help || commandText === undefined || commandText === 'help') {
    return ok<ParsedCommandLine>({kind: 'help'});
  }

  const command = CommandNameSchema.safeParse(commandText);
  if (!command.success) {
    return err('usage_error', `Unknown command: ${commandText}`);
  }

  const environment = envSchema.safeParse(env);
  if (!environment.success) {
    return err('config_error', `Invalid environment: ${describeIssues(environment.error)}`);
  }

  const overrides = z
    .object({
      timeoutMs: numberFromEnv.optional(),
      threads: numberFromEnv.optional(),
      logLevel: LogLevelSchema.optional()
    })
    .safeParse({timeoutMs: values.timeout, threads: values.threads, logLevel: values['log-level']});
  if (!overrides.success) {
    return err('usage_error', `Invalid option: ${describeIssues(overrides.error)}`);
  }

  const fromEnv = environment.data;
  const anchorPath = values.anchor ?? fromEnv.XRDINFO_ANCHOR;
  const instance = values.instance ?? fromEnv.XRDINFO_INSTANCE;
  const gatewayUrl = values.gateway ?? fromEnv.XRDINFO_GATEWAY_URL;
  const confServer = values['conf-server'] ?? fromEnv.XRDINFO_CONF_SERVER;
  const timeoutMs = overrides.data.timeoutMs ?? fromEnv.XRDINFO_TIMEOUT_MS;
  const userId = values['user-id'] ?? fromEnv.XRDINFO_USER_ID;
  const certPath = values.cert ?? fromEnv.XRDINFO_TLS_CERT;
  const keyPath = values.key ?? fromEnv.XRDINFO_TLS_KEY;
  const caPath = values.ca ?? fromEnv.XRDINFO_TLS_CA;
  const rejectUnauthorized = values['no-verify'] ? false : fromEnv.XRDINFO_TLS_VERIFY;

  return ok<ParsedCommandLine>({
    kind: 'run',
    config: {
      command: command.data,
      args,
      ...(anchorPath ? {anchorPath} : {}),
      ...(instance ? {instance} : {}),
      ...(gatewayUrl ? {gatewayUrl} : {}),
      ...(confServer ? {confServer} : {}),
      ...(timeoutMs !== undefined ? {timeoutMs} : {}),
      threads: overrides.data.threads ?? fromEnv.XRDINFO_THREADS ?? DEFAULT_THREADS,
      ...(userId ? {userId} : {}),
      tls: {
        ...(certPath ? {certPath} : {}),
        ...(keyPath ? {keyPath} : {}),
        ...(caPath ? {caPath} : {}),
        ...(rejectUnauthorized !== undefined ? {rejectUnauthorized} : {})
      },
      logging: {
        level: overrides.data.logLevel ?? fromEnv.XRDINFO_LOG_LEVEL ?? 'silent'
      },
      flags: {
        rest: values.rest ?? false,
        allowed: values.allowed ?? false,
        registered: values.registered ?? false,
        withServers: values['with-servers'] ?? false,
        operations: values.operations ?? false,
        endpoints: values.endpoints ?? false,
        status: values.status ?? false,
        all: values.all ?? false
      }
    }
  });
};

export const usage = `Usage: xrdinfo <command> [options] [arguments]

Commands:
  members                      members of the instance
  subsystems                   subsystems (--registered, --with-servers)
  servers                      security servers and their addresses
  server-ips                   IPv4 addresses of all security servers
  methods CLIENT SUBSYSTEM     services of a subsystem (--allowed, --rest)
  methods --all CLIENT         services of every registered subsystem (--allowed, --rest, --threads)
  wsdl CLIENT SERVICE          WSDL of a SOAP service (--operations)
  wsdl --all CLIENT            WSDL status of every SOAP service of every registered subsystem (--threads)
  openapi CLIENT SERVICE       OpenAPI description of a REST service (--endpoints)
  expiration                   expiration of the configuration parts (--status)

Options:
  -a, --anchor PATH            configuration anchor file (XRDINFO_ANCHOR)
  -i, --instance CODE          instance to read (XRDINFO_INSTANCE)
  -s, --gateway URL            security server for metadata requests (XRDINFO_GATEWAY_URL)
      --conf-server ADDRESS    security server whose verificationconf supplies shared parameters
                               when no anchor is given; defaults to the gateway (XRDINFO_CONF_SERVER)
      --threads N              subsystems queried at once by --all sweeps, default 1 (XRDINFO_THREADS)
  -t, --timeout MS             request timeout in milliseconds (XRDINFO_TIMEOUT_MS)
      --cert PATH, --key PATH  client TLS certificate and key (XRDINFO_TLS_CERT, XRDINFO_TLS_KEY)
      --ca PATH                CA bundle for peer verification (XRDINFO_TLS_CA)
      --no-verify              skip peer certificate verification (XRDINFO_TLS_VERIFY=false)
      --user-id ID             user id sent in SOAP requests (XRDINFO_USER_ID)
      --log-level LEVEL        debug, info, warn, error, fatal or silent (XRDINFO_LOG_LEVEL)
`;
