import { parseArgs } from 'node:util';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import type { LogLevel } from './logger.js';
import type { ProviderSettings } from './provider.js';

export type ChatConfig = ProviderSettings & {
  stream: boolean;
  systemPrompt: string;
  maxTokens: number;
  temperature: number;
  logLevel: LogLevel;
};

export type LoadedConfig = { help: true } | { help: false; config: ChatConfig };

export const DEFAULTS = {
  MODEL: 'gpt-35-turbo',
  API_VERSION: '2025-01-01-preview',
  SYSTEM_PROMPT: 'You are a helpful assistant.',
  MAX_TOKENS: 1000,
  TEMPERATURE: 0.7,
  CONNECT_TIMEOUT_MS: 30000,
  READ_TIMEOUT_MS: 60000,
} as const;

export const USAGE = `Usage: stream-chat [options]

Options:
  -e, --endpoint <url>        Chat endpoint base URL (OPENAI_API_ENDPOINT)
  -k, --api-key <key>         API key (OPENAI_API_KEY)
  -m, --model <name>          Model or Azure deployment name (OPENAI_API_MODEL, default ${DEFAULTS.MODEL})
      --api-version <v>       Azure API version (OPENAI_API_VERSION, default ${DEFAULTS.API_VERSION})
      --provider <p>          azure | openai (CHAT_PROVIDER, default azure)
      --stream, --no-stream   Stream the reply token by token (CHAT_STREAM, default on)
      --system <text>         System prompt (CHAT_SYSTEM_PROMPT)
      --max-tokens <n>        Completion token limit (CHAT_MAX_TOKENS, default ${DEFAULTS.MAX_TOKENS})
      --temperature <t>       Sampling temperature 0-2 (CHAT_TEMPERATURE, default ${DEFAULTS.TEMPERATURE})
      --connect-timeout <ms>  Time allowed until response headers (CHAT_CONNECT_TIMEOUT_MS)
      --read-timeout <ms>     Max silence between stream chunks (CHAT_READ_TIMEOUT_MS)
      --log-level <level>     fatal|error|warn|info|debug|trace|silent (LOG_LEVEL, default warn)
  -h, --help                  Show this help
`;

const Flag = z
  .string()
  .trim()
  .transform((v) => v.toLowerCase())
  .pipe(z.enum(['1', '0', 'true', 'false', 'yes', 'no', 'on', 'off']))
  .transform((v) => ['1', 'true', 'yes', 'on'].includes(v));

const ConfigSchema = z.object({
  endpoint: z
    .string({ required_error: 'endpoint' })
    .trim()
    .min(1, 'must not be empty')
    .url('endpoint must be a URL')
    .refine((v) => /^https?:\/\//i.test(v), 'endpoint must use http or https'),
  apiKey: z.string({ required_error: 'apiKey' }).trim().min(1, 'must not be empty'),
  model: z.string().trim().min(1).default(DEFAULTS.MODEL),
  apiVersion: z.string().trim().min(1).default(DEFAULTS.API_VERSION),
  flavor: z.enum(['azure', 'openai']).default('azure'),
  stream: Flag.default('true'),
  systemPrompt: z.string().trim().min(1, 'must not be empty').default(DEFAULTS.SYSTEM_PROMPT),
  maxTokens: z.coerce.number().int().positive().default(DEFAULTS.MAX_TOKENS),
  temperature: z.coerce.number().min(0).max(2).default(DEFAULTS.TEMPERATURE),
  connectTimeoutMs: z.coerce.number().int().positive().default(DEFAULTS.CONNECT_TIMEOUT_MS),
  readTimeoutMs: z.coerce.number().int().positive().default(DEFAULTS.READ_TIMEOUT_MS),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('warn'),
});

type ConfigKey = keyof z.input<typeof ConfigSchema>;

const SOURCES: Record<ConfigKey, { flag: string; env: string }> = {
  endpoint: { flag: '--endpoint', env: 'OPENAI_API_ENDPOINT' },
  apiKey: { flag: '--api-key', env: 'OPENAI_API_KEY' },
  model: { flag: '--model', env: 'OPENAI_API_MODEL' },
  apiVersion: { flag: '--api-version', env: 'OPENAI_API_VERSION' },
  flavor: { flag: '--provider', env: 'CHAT_PROVIDER' },
  stream: { flag: '--stream/--no-stream', env: 'CHAT_STREAM' },
  systemPrompt: { flag: '--system', env: 'CHAT_SYSTEM_PROMPT' },
  maxTokens: { flag: '--max-tokens', env: 'CHAT_MAX_TOKENS' },
  temperature: { flag: '--temperature', env: 'CHAT_TEMPERATURE' },
  connectTimeoutMs: { flag: '--connect-timeout', env: 'CHAT_CONNECT_TIMEOUT_MS' },
  readTimeoutMs: { flag: '--read-timeout', env: 'CHAT_READ_TIMEOUT_MS' },
  logLevel: { flag: '--log-level', env: 'LOG_LEVEL' },
};

const OPTIONS = {
  endpoint: { type: 'string', short: 'e' },
  'api-key': { type: 'string', short: 'k' },
  model: { type: 'string', short: 'm' },
  'api-version': { type: 'string' },
  provider: { type: 'string' },
  stream: { type: 'boolean' },
  'no-stream': { type: 'boolean' },
  system: { type: 'string' },
  'max-tokens': { type: 'string' },
  temperature: { type: 'string' },
  'connect-timeout': { type: 'string' },
  'read-timeout': { type: 'string' },
  'log-level': { type: 'string' },
  help: { type: 'boolean', short: 'h' },
} as const;

// Flags win over environment variables; blank environment values count as unset.
export function loadConfig(argv: string[], env: NodeJS.ProcessEnv): LoadedConfig {
  const values = readFlags(argv);
  if (values.help) return { help: true };

  const fromEnv = (key: ConfigKey) => {
    const v = env[SOURCES[key].env];
    return v === undefined || v.trim() === '' ? undefined : v;
  };
  const streamFlag = values['no-stream'] ? 'false' : values.stream ? 'true' : undefined;

  const raw: Record<ConfigKey, string | undefined> = {
    endpoint: values.endpoint ?? fromEnv('endpoint'),
    apiKey: values['api-key'] ?? fromEnv('apiKey'),
    model: values.model ?? fromEnv('model'),
    apiVersion: values['api-version'] ?? fromEnv('apiVersion'),
    flavor: values.provider ?? fromEnv('flavor'),
    stream: streamFlag ?? fromEnv('stream'),
    systemPrompt: values.system ?? fromEnv('systemPrompt'),
    maxTokens: values['max-tokens'] ?? fromEnv('maxTokens'),
    temperature: values.temperature ?? fromEnv('temperature'),
    connectTimeoutMs: values['connect-timeout'] ?? fromEnv('connectTimeoutMs'),
    readTimeoutMs: values['read-timeout'] ?? fromEnv('readTimeoutMs'),
    logLevel: values['log-level'] ?? fromEnv('logLevel'),
  };

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue ? issue.path[0] : undefined;
    if (key === 'endpoint' && raw.endpoint === undefined) {
      throw new ConfigurationError(
        'Chat endpoint is required. Provide it via --endpoint argument or OPENAI_API_ENDPOINT environment variable',
      );
    }
    if (key === 'apiKey' && raw.apiKey === undefined) {
      throw new ConfigurationError(
        'API key is required. Provide it via --api-key argument or OPENAI_API_KEY environment variable',
      );
    }
    const source = typeof key === 'string' && isConfigKey(key) ? SOURCES[key] : undefined;
    const where = source ? ` (${source.flag} / ${source.env})` : '';
    throw new ConfigurationError(`Invalid configuration${where}: ${issue?.message ?? 'unknown error'}`);
  }
  return { help: false, config: parsed.data };
}

function readFlags(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: OPTIONS, strict: true, allowPositionals: false }).values;
  } catch (err) {
    throw new ConfigurationError(err instanceof Error ? err.message : String(err));
  }
}

function isConfigKey(key: string): key is ConfigKey {
  return Object.prototype.hasOwnProperty.call(SOURCES, key);
}
