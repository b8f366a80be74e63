/**
 * @fileoverview Client configuration loading from YAML.
 * Validates and caches configuration for the session client.
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import {
  CHALLENGES_PER_PLAYER,
  MAX_REGENERATIONS,
  RETRY_BASE_DELAY_MS,
  RETRY_MAX_ATTEMPTS,
  ROUND_DURATION_MS,
  SESSION_POLL_INTERVAL_MS,
  TRANSITION_POLL_INTERVAL_MS,
} from '@inkling/shared';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

const ClientConfigSchema = z.object({
  api: z.object({
    baseUrl: z.string().url(),
    token: z.string().min(1).optional(),
  }),
  polling: z
    .object({
      sessionIntervalMs: z.number().int().positive().default(SESSION_POLL_INTERVAL_MS),
      transitionIntervalMs: z.number().int().positive().default(TRANSITION_POLL_INTERVAL_MS),
    })
    .default({}),
  retry: z
    .object({
      maxAttempts: z.number().int().positive().default(RETRY_MAX_ATTEMPTS),
      baseDelayMs: z.number().int().min(0).default(RETRY_BASE_DELAY_MS),
      backoff: z.enum(['linear', 'exponential']).default('linear'),
    })
    .default({}),
  game: z
    .object({
      roundDurationMs: z.number().int().positive().default(ROUND_DURATION_MS),
      challengesPerPlayer: z.number().int().positive().default(CHALLENGES_PER_PLAYER),
      maxRegenerations: z.number().int().min(0).default(MAX_REGENERATIONS),
    })
    .default({}),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export type ClientConfig = z.infer<typeof ClientConfigSchema>;

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: z.ZodIssue[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Last loaded configuration and the file it came from */
let cachedConfig: { path: string; config: ClientConfig } | null = null;

/**
 * Validate an already-parsed configuration object.
 */
export function parseClientConfig(raw: unknown): ClientConfig {
  const result = ClientConfigSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid client configuration: ${details}`, result.error.issues);
  }
  return result.data;
}

/**
 * Load and validate client configuration from a YAML file.
 * Caches the result per file path for subsequent calls.
 *
 * Config file is loaded from:
 * - the `path` argument if given
 * - CONFIG_PATH environment variable if set
 * - Otherwise from ./config/client.yaml relative to cwd (project root)
 */
export function loadClientConfig(path?: string): ClientConfig {
  // biome-ignore lint/complexity/useLiteralKeys: TypeScript requires bracket notation for index signatures
  const configPath = path ?? process.env['CONFIG_PATH'] ?? join(process.cwd(), 'config/client.yaml');
  if (cachedConfig?.path === configPath) {
    return cachedConfig.config;
  }

  const fileContents = readFileSync(configPath, 'utf8');
  const rawConfig: unknown = parseYaml(fileContents);
  const config = parseClientConfig(rawConfig);
  cachedConfig = { path: configPath, config };
  return config;
}

/**
 * Clear the cached config (useful for testing or hot-reloading)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}
