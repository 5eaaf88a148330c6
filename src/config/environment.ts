import 'dotenv/config';
import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import ms from 'ms';
import YAML from 'yaml';
import { z } from 'zod';

const MIB = 1024 * 1024;

export const DEFAULT_STATEMENT_MAX_ITEMS = 1_000_000;
export const DEFAULT_STATEMENT_MAX_BYTES = 256 * MIB;

/**
 * Parse a duration given as a human string ("1s", "5m") or plain milliseconds.
 */
export function parseDuration(raw: string | number | undefined): number | undefined {
  if (raw === undefined) return undefined;
  if (typeof raw === 'number') return Number.isFinite(raw) && raw >= 0 ? raw : undefined;

  const trimmed = raw.trim();
  if (!trimmed) return undefined;
  if (/^\d+(\.\d+)?$/.test(trimmed)) return Number.parseFloat(trimmed);

  const parsed = ms(trimmed);
  return typeof parsed === 'number' && Number.isFinite(parsed) && parsed >= 0 ? parsed : undefined;
}

function parseOptionalInt(envKey: string): number | undefined {
  const raw = process.env[envKey];
  if (!raw) return undefined;
  const n = Number.parseInt(raw, 10);
  return Number.isFinite(n) ? n : undefined;
}

function parseOptionalFloat(envKey: string): number | undefined {
  const raw = process.env[envKey];
  if (!raw) return undefined;
  const n = Number.parseFloat(raw);
  return Number.isFinite(n) ? n : undefined;
}

function parseOptionalDuration(envKey: string): number | undefined {
  return parseDuration(process.env[envKey]);
}

const durationSchema = z.union([z.string(), z.number()]);

const fileConfigSchema = z.object({
  retry: z
    .object({
      max_attempts: z.number().int().optional(),
      initial_delay: durationSchema.optional(),
      max_delay: durationSchema.optional(),
      backoff_multiplier: z.number().optional(),
      jitter_fraction: z.number().optional(),
    })
    .optional(),
  limits: z
    .object({
      statement_max_items: z.number().int().positive().optional(),
      statement_max_bytes: z.number().int().positive().optional(),
      tool_deadline: durationSchema.optional(),
      request_timeout: durationSchema.optional(),
    })
    .optional(),
});

export type FileConfig = z.infer<typeof fileConfigSchema>;

/**
 * Read `.databricks-mcp/config.yaml` from the working directory.
 *
 * A missing file yields an empty config; a file that exists but does not
 * match the schema is a startup error.
 */
export function loadFileConfig(basePath: string = process.cwd()): FileConfig {
  const configPath = resolve(basePath, '.databricks-mcp', 'config.yaml');

  let raw: string;
  try {
    raw = readFileSync(configPath, 'utf-8');
  } catch {
    return {};
  }

  const parsed = fileConfigSchema.safeParse(YAML.parse(raw) ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', ');
    throw new Error(`Invalid ${configPath}: ${issues}`);
  }
  return parsed.data;
}

const fileConfig = loadFileConfig();

export const config = {
  // Databricks workspace
  databricksHost: process.env.DATABRICKS_HOST ?? '',
  databricksToken: process.env.DATABRICKS_TOKEN ?? '',
  requestTimeoutMs:
    parseOptionalDuration('DATABRICKS_REQUEST_TIMEOUT') ??
    parseDuration(fileConfig.limits?.request_timeout) ??
    60_000,

  // Databricks account
  databricksAccountId: process.env.DATABRICKS_ACCOUNT_ID ?? '',
  databricksAccountHost:
    process.env.DATABRICKS_ACCOUNT_HOST ?? 'https://accounts.cloud.databricks.com',

  // Retry policy overrides; validated by createRetryPolicy
  retry: {
    maxAttempts: parseOptionalInt('RETRY_MAX_ATTEMPTS') ?? fileConfig.retry?.max_attempts,
    initialDelayMs:
      parseOptionalDuration('RETRY_INITIAL_DELAY') ??
      parseDuration(fileConfig.retry?.initial_delay),
    maxDelayMs:
      parseOptionalDuration('RETRY_MAX_DELAY') ?? parseDuration(fileConfig.retry?.max_delay),
    backoffMultiplier:
      parseOptionalFloat('RETRY_BACKOFF_MULTIPLIER') ?? fileConfig.retry?.backoff_multiplier,
    jitterFraction:
      parseOptionalFloat('RETRY_JITTER_FRACTION') ?? fileConfig.retry?.jitter_fraction,
  },

  // Invocation limits
  toolDeadlineMs:
    parseOptionalDuration('TOOL_DEADLINE') ??
    parseDuration(fileConfig.limits?.tool_deadline) ??
    5 * 60_000,
  statementMaxItems:
    parseOptionalInt('STATEMENT_MAX_ITEMS') ??
    fileConfig.limits?.statement_max_items ??
    DEFAULT_STATEMENT_MAX_ITEMS,
  statementMaxBytes:
    parseOptionalInt('STATEMENT_MAX_BYTES') ??
    fileConfig.limits?.statement_max_bytes ??
    DEFAULT_STATEMENT_MAX_BYTES,

  // Langfuse
  langfusePublicKey: process.env.LANGFUSE_PUBLIC_KEY ?? '',
  langfuseSecretKey: process.env.LANGFUSE_SECRET_KEY ?? '',
  langfuseBaseUrl: process.env.LANGFUSE_BASEURL ?? 'https://cloud.langfuse.com',

  // Application
  nodeEnv: process.env.NODE_ENV ?? 'development',
} as const;

// Validate required variables in production
if (config.nodeEnv === 'production') {
  const required = ['databricksHost', 'databricksToken'] as const;

  for (const key of required) {
    if (!config[key]) {
      throw new Error(`Missing required environment variable for ${key}`);
    }
  }
}
