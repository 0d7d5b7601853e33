// CLI operations
// Each command returns an exit code (and prompt output) instead of exiting,
// so the entry point decides how to terminate.

import ora from 'ora';
import { z } from 'zod';
import type { AppConfig } from './config.js';
import type { CommandResult, Credential } from './types.js';
import { ExitCode, FetchError, GitError, StoreError, errorMessage } from './errors.js';
import { CredentialStore } from './storage/secrets.js';
import { ProjectRegistry } from './storage/projects.js';
import { IssueCache } from './storage/issues.js';
import { type GitService, createGitService } from './utils/git.js';
import { parseBranch } from './jira/branch.js';
import { normalizeDomain } from './jira/domain.js';
import { type FetchSummary, fetchCloudId, fetchIssueSummary, verifyCredentials } from './api/jira.js';
import {
  displayDebug,
  displayDomainList,
  displayError,
  displayInfo,
  displaySuccess,
  displayWarning,
} from './ui/display.js';

export interface JiraApi {
  fetchSummary: FetchSummary;
  fetchCloudId: typeof fetchCloudId;
  verifyCredentials: typeof verifyCredentials;
}

export interface CommandDeps {
  config: AppConfig;
  git: GitService;
  secrets: CredentialStore;
  projects: ProjectRegistry;
  issues: IssueCache;
  jira: JiraApi;
}

export const DEFAULT_FORMAT = '{summary}';

export function createDeps(config: AppConfig, cwd: string = process.cwd()): CommandDeps {
  return {
    config,
    git: createGitService(cwd),
    secrets: new CredentialStore(config.configDir),
    projects: new ProjectRegistry(config.configDir),
    issues: new IssueCache(config.configDir, config.cacheTtlMs),
    jira: {
      fetchSummary: fetchIssueSummary,
      fetchCloudId,
      verifyCredentials,
    },
  };
}

/**
 * Fill `{key}` and `{summary}` in an output template
 */
export function formatIssue(template: string, issueKey: string, summary: string): string {
  return template.replace(/\{(key|summary)\}/g, (_, name: string) => (name === 'key' ? issueKey : summary));
}

function isNotFound(error: unknown): error is StoreError {
  return error instanceof StoreError && error.kind === 'NotFound';
}

function ok(stdout?: string): CommandResult {
  return { exitCode: ExitCode.Ok, stdout };
}

function fail(exitCode: number, message: string): CommandResult {
  displayError(message);
  return { exitCode };
}

// ===== VIEW =====

export interface ViewOptions {
  format?: string;
}

/**
 * Print the summary of the issue named by the current branch.
 * Unrecognized branches print nothing and succeed; the prompt must not break.
 */
export async function viewGitIssue(deps: CommandDeps, options: ViewOptions = {}): Promise<CommandResult> {
  const template = options.format ?? DEFAULT_FORMAT;

  try {
    let branch: string;
    try {
      branch = await deps.git.currentBranch();
    } catch (error) {
      displayDebug(`git branch lookup failed: ${errorMessage(error)}`);
      return ok('');
    }

    const parsed = parseBranch(branch);
    if (!parsed.ok) {
      displayDebug(`branch "${branch}" does not name a Jira issue`);
      return ok('');
    }
    const { issueKey } = parsed;

    const cached = await deps.issues.get(issueKey);
    if (cached !== undefined) {
      displayDebug(`cache hit for ${issueKey}`);
      return ok(formatIssue(template, issueKey, cached));
    }

    let domain: string;
    try {
      domain = await deps.projects.lookup(await deps.git.projectId());
    } catch (error) {
      if (error instanceof GitError) {
        return fail(ExitCode.NotGitRepository, error.message);
      }
      if (isNotFound(error)) {
        return fail(ExitCode.ProjectNotRegistered, error.message);
      }
      throw error;
    }

    let credential: Credential;
    try {
      credential = await deps.secrets.lookup(domain);
    } catch (error) {
      if (isNotFound(error)) {
        return fail(ExitCode.MissingCredentials, error.message);
      }
      throw error;
    }

    let summary: string;
    try {
      summary = await deps.jira.fetchSummary({
        domain,
        credential,
        issueKey,
        apiVersion: deps.config.apiVersion,
        timeoutMs: deps.config.requestTimeoutMs,
      });
    } catch (error) {
      if (error instanceof FetchError) {
        return fail(ExitCode.FetchFailed, `${issueKey}: ${error.message}`);
      }
      throw error;
    }

    try {
      await deps.issues.put(issueKey, summary);
    } catch (error) {
      displayDebug(`could not cache ${issueKey}: ${errorMessage(error)}`);
    }

    return ok(formatIssue(template, issueKey, summary));
  } catch (error) {
    return fail(ExitCode.Failure, errorMessage(error));
  }
}

// ===== REGISTRATION =====

const emailSchema = z.string().trim().email();

export interface RegisterSecretsInput {
  domain: string;
  email: string;
  apiKey: string;
  /** Resolve the cloud id and check the token against Jira before saving */
  verify: boolean;
}

export async function registerSecrets(deps: CommandDeps, input: RegisterSecretsInput): Promise<CommandResult> {
  const domain = normalizeDomain(input.domain);
  if (!domain) {
    return fail(ExitCode.Failure, `"${input.domain}" is not a Jira Cloud site name (expected e.g. "acme" for acme.atlassian.net).`);
  }
  const email = emailSchema.safeParse(input.email);
  if (!email.success) {
    return fail(ExitCode.Failure, `"${input.email}" is not a valid email address.`);
  }
  const apiKey = input.apiKey.trim();
  if (!apiKey) {
    return fail(ExitCode.Failure, 'API key must not be empty.');
  }

  let cloudId: string | undefined;
  if (input.verify) {
    const { apiVersion, requestTimeoutMs } = deps.config;
    const spinner = ora(`Checking credentials for ${domain}.atlassian.net...`).start();
    try {
      cloudId = await deps.jira.fetchCloudId(domain, email.data, apiKey, requestTimeoutMs);
      const account = await deps.jira.verifyCredentials(
        { domain, email: email.data, apiKey, cloudId },
        apiVersion,
        requestTimeoutMs
      );
      spinner.succeed(`Authenticated as ${account}`);
    } catch (error) {
      spinner.fail('Credential check failed');
      return fail(ExitCode.VerificationFailed, errorMessage(error));
    }
  }

  try {
    await deps.secrets.register(domain, email.data, apiKey, cloudId);
  } catch (error) {
    return fail(ExitCode.PersistFailed, errorMessage(error));
  }

  displaySuccess(`Registered ${domain} with provided email and API key.`);
  return ok();
}

export async function registerProject(deps: CommandDeps, rawDomain: string): Promise<CommandResult> {
  const domain = normalizeDomain(rawDomain);
  if (!domain) {
    return fail(ExitCode.Failure, `"${rawDomain}" is not a Jira Cloud site name.`);
  }

  let projectId: string;
  try {
    projectId = await deps.git.projectId();
  } catch (error) {
    return fail(ExitCode.NotGitRepository, errorMessage(error));
  }

  if (!(await deps.secrets.has(domain))) {
    displayWarning(`No API key registered for ${domain} yet. Run --register-secrets ${domain} <email> <api_key>.`);
  }

  let previous: string | undefined;
  try {
    previous = await deps.projects.register(projectId, domain);
  } catch (error) {
    return fail(ExitCode.PersistFailed, errorMessage(error));
  }

  if (previous && previous !== domain) {
    displayWarning(`${projectId} was bound to ${previous}; replaced with ${domain}.`);
  }
  displaySuccess(`Registered ${projectId} → ${domain}.`);
  return ok();
}

// ===== MAINTENANCE =====

export async function unregisterSecrets(deps: CommandDeps, rawDomain: string): Promise<CommandResult> {
  const domain = normalizeDomain(rawDomain) ?? rawDomain;
  try {
    if (!(await deps.secrets.remove(domain))) {
      return fail(ExitCode.MissingCredentials, `No API key found for domain ${domain}.`);
    }
  } catch (error) {
    return fail(ExitCode.PersistFailed, errorMessage(error));
  }
  displaySuccess(`Removed credentials for ${domain}.`);
  return ok();
}

export async function unregisterProject(deps: CommandDeps): Promise<CommandResult> {
  let projectId: string;
  try {
    projectId = await deps.git.projectId();
  } catch (error) {
    return fail(ExitCode.NotGitRepository, errorMessage(error));
  }

  try {
    if (!(await deps.projects.remove(projectId))) {
      return fail(ExitCode.ProjectNotRegistered, `No Jira domain registered for ${projectId}.`);
    }
  } catch (error) {
    return fail(ExitCode.PersistFailed, errorMessage(error));
  }
  displaySuccess(`Removed Jira binding for ${projectId}.`);
  return ok();
}

export async function clearCache(deps: CommandDeps): Promise<CommandResult> {
  try {
    await deps.issues.clear();
  } catch (error) {
    return fail(ExitCode.PersistFailed, errorMessage(error));
  }
  displayInfo('Issue cache cleared.');
  return ok();
}

export async function listDomains(deps: CommandDeps): Promise<CommandResult> {
  displayDomainList(await deps.secrets.list());
  return ok();
}
