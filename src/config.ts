import { z } from 'zod';
import { VERSION } from './version.js';

const DEFAULT_API_URL = 'http://localhost:8000';
export const DEFAULT_MODEL = 'claude-sonnet-4-5';

const ENV_NAMES = {
  apiUrl: 'SHEETS_AGENT_API_URL',
  apiKey: 'SHEETS_AGENT_API_KEY',
  defaultModel: 'SHEETS_AGENT_MODEL',
  timeoutMs: 'SHEETS_AGENT_TIMEOUT_MS',
  userAgent: 'SHEETS_AGENT_USER_AGENT',
  debug: 'SHEETS_AGENT_DEBUG',
} as const;

function isConfigKey(key: unknown): key is keyof typeof ENV_NAMES {
  return typeof key === 'string' && Object.hasOwn(ENV_NAMES, key);
}

function readEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function parseBooleanEnv(value?: string): boolean | undefined {
  if (value === undefined) return undefined;
  const normalized = value.toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return undefined;
}

function parseIntegerEnv(value?: string): number | undefined {
  if (value === undefined) return undefined;
  return Number(value);
}

const configSchema = z.object({
  apiUrl: z.string().url().default(DEFAULT_API_URL),
  apiKey: z.string().min(1).optional(),
  defaultModel: z.string().min(1).default(DEFAULT_MODEL),
  timeoutMs: z.number().int().positive().optional(),
  userAgent: z.string().min(1).default(`sheets-agent-mcp/${VERSION}`),
  debug: z.boolean().default(false),
});

/**
 * Process-wide settings, resolved once at startup. The adapter only ever
 * reads them; `apiKey` must never reach a log line or a progress message.
 */
export type Config = Readonly<Omit<z.infer<typeof configSchema>, 'apiKey'> & { apiKey: string }>;

const MISSING_API_KEY_ERROR = `Set ${ENV_NAMES.apiKey} to the backend service API key.`;

export function isMissingApiKeyError(err: unknown): boolean {
  return err instanceof Error && err.message === MISSING_API_KEY_ERROR;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = configSchema.safeParse({
    apiUrl: readEnv(env, ENV_NAMES.apiUrl),
    apiKey: readEnv(env, ENV_NAMES.apiKey),
    defaultModel: readEnv(env, ENV_NAMES.defaultModel),
    timeoutMs: parseIntegerEnv(readEnv(env, ENV_NAMES.timeoutMs)),
    userAgent: readEnv(env, ENV_NAMES.userAgent),
    debug: parseBooleanEnv(readEnv(env, ENV_NAMES.debug)),
  });

  if (!parsed.success) {
    const invalid = parsed.error.issues
      .map((issue) => {
        const key = issue.path[0];
        return isConfigKey(key) ? ENV_NAMES[key] : issue.path.join('.');
      })
      .join(', ');
    throw new Error(`Invalid configuration. Missing/invalid: ${invalid}`);
  }

  const { apiKey, ...rest } = parsed.data;
  if (!apiKey) {
    throw new Error(MISSING_API_KEY_ERROR);
  }

  return Object.freeze({
    ...rest,
    apiUrl: rest.apiUrl.replace(/\/+$/, ''),
    apiKey,
  });
}
