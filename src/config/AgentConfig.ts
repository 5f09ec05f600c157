import { z } from 'zod';
import { ConfigurationError } from '../kubernetes/ErrorHandling.js';

/**
 * Raw command line, before validation
 */
export interface CliOptions {
  host?: string;
  port?: string;
  token?: string;
  urlPrefix?: string;
  pathPrefix?: string;
  noCertCheck?: boolean;
  debug?: boolean;
  verbose: number;
  help?: boolean;
}

export function normalizePathPrefix(value: string): string {
  if (!value) {
    return '';
  }
  return `/${value.replace(/^\/+|\/+$/g, '')}`;
}

export const AgentConfigSchema = z.object({
  host: z.string({ required_error: 'the HOST argument is required' }).min(1),
  port: z.coerce.number().int().min(1).max(65535).default(443),
  token: z.string({ required_error: 'the --token option is required' }).min(1),
  urlPrefix: z.string().min(1).optional(),
  pathPrefix: z.string().default('').transform(normalizePathPrefix),
  noCertCheck: z.boolean().default(false),
  caFile: z.string().min(1).optional(),
  debug: z.boolean().default(false),
  verbose: z.number().int().min(0).default(0),
});

export type AgentConfig = z.infer<typeof AgentConfigSchema>;

const VALUE_OPTIONS: Record<string, 'port' | 'token' | 'urlPrefix' | 'pathPrefix'> = {
  '--port': 'port',
  '--token': 'token',
  '--url-prefix': 'urlPrefix',
  '--path-prefix': 'pathPrefix',
};

const SWITCHES = new Set(['--no-cert-check', '--debug', '--verbose', '--help']);

/**
 * Walk the argument vector. Values may follow their option or be attached
 * with `=`; `-vv` counts as two `-v`. Switches take no value.
 */
export function parseArgs(args: readonly string[]): CliOptions {
  const options: CliOptions = { verbose: 0 };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const [flag, attached]: [string, string | undefined] =
      arg.startsWith('--') && arg.includes('=') ? splitOnce(arg) : [arg, undefined];

    const valueKey = VALUE_OPTIONS[flag];
    if (valueKey) {
      const value = attached ?? args[++i];
      if (value === undefined) {
        throw new ConfigurationError(`argument ${flag}: expected one argument`);
      }
      options[valueKey] = value;
    } else if (attached !== undefined && SWITCHES.has(flag)) {
      throw new ConfigurationError(`argument ${flag}: ignored explicit argument '${attached}'`);
    } else if (flag === '--no-cert-check') {
      options.noCertCheck = true;
    } else if (flag === '--debug') {
      options.debug = true;
    } else if (flag === '--verbose') {
      options.verbose += 1;
    } else if (/^-v+$/.test(flag)) {
      options.verbose += flag.length - 1;
    } else if (flag === '-h' || flag === '--help') {
      options.help = true;
    } else if (flag.startsWith('-')) {
      throw new ConfigurationError(`unrecognized argument: ${flag}`);
    } else if (options.host === undefined) {
      options.host = flag;
    } else {
      throw new ConfigurationError(`unrecognized argument: ${flag}`);
    }
  }

  return options;
}

function splitOnce(arg: string): [string, string] {
  const index = arg.indexOf('=');
  return [arg.slice(0, index), arg.slice(index + 1)];
}

/**
 * Validate the command line. The CA bundle for certificate checks is taken
 * from `REQUESTS_CA_BUNDLE`.
 */
export function loadAgentConfig(
  options: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
): AgentConfig {
  const result = AgentConfigSchema.safeParse({
    host: options.host,
    port: options.port,
    token: options.token,
    urlPrefix: options.urlPrefix,
    pathPrefix: options.pathPrefix,
    noCertCheck: options.noCertCheck ?? false,
    caFile: env.REQUESTS_CA_BUNDLE || undefined,
    debug: options.debug ?? false,
    verbose: options.verbose,
  });

  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path.join('.') || 'arguments';
    throw new ConfigurationError(`${field}: ${issue?.message ?? 'invalid configuration'}`);
  }
  return result.data;
}

/**
 * Base URL of the API server
 */
export function apiServerUrl(config: AgentConfig): string {
  const base = config.urlPrefix ?? `https://${config.host}`;
  return `${base}:${config.port}${config.pathPrefix}`;
}

export const USAGE = `
Usage: k8s-special-agent [options] HOST

Collect cluster data from the Kubernetes API and print it as agent sections.

Arguments:
  HOST                  Kubernetes host to connect to

Options:
  --token <token>       Token for that user (required)
  --port <port>         Port to connect to (default: 443)
  --url-prefix <url>    Custom URL prefix for Kubernetes API calls
  --path-prefix <path>  Optional URL path prefix to prepend to Kubernetes API calls
  --no-cert-check       Disable certificate verification
  --debug               Debug mode: raise errors with stack traces
  -v, --verbose         Verbose mode (for even more output use -vvv)
  -h, --help            Show this help message
`;
