import { z } from 'zod';
import { ConfigurationError } from '../errors';
import { DEFAULT_MAX_RETRIES, DEFAULT_TIMEOUT_MS } from '../constants';

/**
 * Environment variable names, in the order they are reported when missing.
 */
export const REQUIRED_ENV_KEYS = [
  'AZURE_OPENAI_API_KEY',
  'AZURE_OPENAI_ENDPOINT',
  'AZURE_OPENAI_DEPLOYMENT',
  'AZURE_OPENAI_API_VERSION',
  'AZURE_OPENAI_MODEL',
] as const;

export type RequiredEnvKey = (typeof REQUIRED_ENV_KEYS)[number];

export const OPTIONAL_ENV_KEYS = {
  maxRetries: 'PDF_RENAMER_MAX_RETRIES',
  timeoutMs: 'PDF_RENAMER_TIMEOUT_MS',
} as const;

// ============================================================================
// Config Schema
// ============================================================================

const integerFromEnv = (min: number, max: number) =>
  z
    .string()
    .trim()
    .regex(/^\d+$/, 'must be a whole number')
    .transform(Number)
    .pipe(z.number().int().min(min).max(max));

export const RenamerConfigSchema = z.object({
  apiKey: z.string(),
  endpoint: z.string().url(),
  deployment: z.string(),
  apiVersion: z.string(),
  model: z.string(),
  maxRetries: integerFromEnv(0, 10).default(String(DEFAULT_MAX_RETRIES)),
  timeoutMs: integerFromEnv(1, 600000).default(String(DEFAULT_TIMEOUT_MS)),
});

export type RenamerConfig = Readonly<z.output<typeof RenamerConfigSchema>>;

type Env = Record<string, string | undefined>;

function readValue(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

/**
 * Build the process configuration from environment variables.
 *
 * Every required key is checked before failing so the error names all of the
 * missing ones at once. The returned object is frozen.
 */
export function loadConfig(env: Env = process.env): RenamerConfig {
  const missing = REQUIRED_ENV_KEYS.filter((key) => readValue(env, key) === undefined);
  if (missing.length > 0) {
    throw new ConfigurationError(
      `Missing required environment variable${missing.length > 1 ? 's' : ''}: ${missing.join(', ')}`,
      [...missing]
    );
  }

  const result = RenamerConfigSchema.safeParse({
    apiKey: readValue(env, 'AZURE_OPENAI_API_KEY'),
    endpoint: readValue(env, 'AZURE_OPENAI_ENDPOINT'),
    deployment: readValue(env, 'AZURE_OPENAI_DEPLOYMENT'),
    apiVersion: readValue(env, 'AZURE_OPENAI_API_VERSION'),
    model: readValue(env, 'AZURE_OPENAI_MODEL'),
    maxRetries: readValue(env, OPTIONAL_ENV_KEYS.maxRetries),
    timeoutMs: readValue(env, OPTIONAL_ENV_KEYS.timeoutMs),
  });

  if (!result.success) {
    const problems = result.error.issues.map((issue) => {
      const field = String(issue.path[0] ?? '');
      return `${envKeyForField(field)} ${issue.message}`;
    });
    throw new ConfigurationError(`Invalid configuration: ${problems.join('; ')}`);
  }

  return Object.freeze(result.data);
}

function envKeyForField(field: string): string {
  switch (field) {
    case 'apiKey':
      return 'AZURE_OPENAI_API_KEY';
    case 'endpoint':
      return 'AZURE_OPENAI_ENDPOINT';
    case 'deployment':
      return 'AZURE_OPENAI_DEPLOYMENT';
    case 'apiVersion':
      return 'AZURE_OPENAI_API_VERSION';
    case 'model':
      return 'AZURE_OPENAI_MODEL';
    case 'maxRetries':
      return OPTIONAL_ENV_KEYS.maxRetries;
    case 'timeoutMs':
      return OPTIONAL_ENV_KEYS.timeoutMs;
    default:
      return field;
  }
}
