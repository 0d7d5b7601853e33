// Runtime configuration
// Read from the environment (optionally populated from .env by the CLI entry point)

import { z } from 'zod';
import { getAppConfigDir } from './utils/platform.js';

export type JiraApiVersion = '2' | '3';

export interface AppConfig {
  /** Directory holding secrets.json, projects.json and issues.json */
  configDir: string;
  /** How long a cached summary stays valid */
  cacheTtlMs: number;
  /** Abort the Jira request after this long so the prompt never stalls */
  requestTimeoutMs: number;
  apiVersion: JiraApiVersion;
  debug: boolean;
}

export const DEFAULT_CACHE_TTL_MINUTES = 240;
export const DEFAULT_REQUEST_TIMEOUT_MS = 2000;

const truthy = z
  .string()
  .optional()
  .transform(value => value !== undefined && ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase()));

const envSchema = z.object({
  JIRA_GIT_ISSUE_HOME: z.string().trim().min(1).optional(),
  JIRA_GIT_ISSUE_TTL_MINUTES: z.coerce.number().positive().default(DEFAULT_CACHE_TTL_MINUTES),
  JIRA_GIT_ISSUE_TIMEOUT_MS: z.coerce.number().int().positive().max(60000).default(DEFAULT_REQUEST_TIMEOUT_MS),
  JIRA_API_VERSION: z.enum(['2', '3']).default('3'),
  JIRA_GIT_ISSUE_DEBUG: truthy,
});

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Build the config from environment variables. Empty strings count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') {
      cleaned[key] = value;
    }
  }

  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue?.path.join('.') || 'environment';
    throw new ConfigError(`Invalid ${variable}: ${issue?.message ?? 'unknown problem'}`);
  }

  const vars = parsed.data;
  return {
    configDir: vars.JIRA_GIT_ISSUE_HOME ?? getAppConfigDir(),
    cacheTtlMs: Math.round(vars.JIRA_GIT_ISSUE_TTL_MINUTES * 60 * 1000),
    requestTimeoutMs: vars.JIRA_GIT_ISSUE_TIMEOUT_MS,
    apiVersion: vars.JIRA_API_VERSION,
    debug: vars.JIRA_GIT_ISSUE_DEBUG,
  };
}
