// Jira Cloud REST client
// Basic auth with email + API token; one attempt per call, no retries

import { z } from 'zod';
import type { Credential } from '../types.js';
import type { JiraApiVersion } from '../config.js';
import { FetchError, errorMessage } from '../errors.js';

const GATEWAY_URL = 'https://api.atlassian.com/ex/jira';

export interface FetchSummaryOptions {
  domain: string;
  credential: Credential;
  issueKey: string;
  apiVersion: JiraApiVersion;
  timeoutMs: number;
}

export type FetchSummary = (options: FetchSummaryOptions) => Promise<string>;

const issueSummarySchema = z.object({
  fields: z.object({
    summary: z.string(),
  }),
});

const myselfSchema = z.object({
  accountId: z.string(),
  displayName: z.string().optional(),
});

const tenantInfoSchema = z.object({
  cloudId: z.string().min(1),
});

export function siteUrl(domain: string): string {
  return `https://${domain}.atlassian.net`;
}

/**
 * REST base for a site. With a cloud id the request goes through the API
 * gateway, which scoped tokens require; otherwise it hits the site directly.
 */
export function apiBaseUrl(domain: string, cloudId: string | undefined, apiVersion: JiraApiVersion): string {
  const base = cloudId ? `${GATEWAY_URL}/${encodeURIComponent(cloudId)}` : siteUrl(domain);
  return `${base}/rest/api/${apiVersion}`;
}

/**
 * Issue endpoint. The gateway answers 401 "scope does not match" when
 * `fields` is restricted, so only the site URL narrows the response.
 */
export function issueUrl(domain: string, credential: Credential, issueKey: string, apiVersion: JiraApiVersion): string {
  const url = `${apiBaseUrl(domain, credential.cloudId, apiVersion)}/issue/${encodeURIComponent(issueKey)}`;
  return credential.cloudId ? url : `${url}?fields=summary`;
}

function basicAuth(email: string, apiKey: string): string {
  return `Basic ${Buffer.from(`${email}:${apiKey}`).toString('base64')}`;
}

async function jiraGet(url: string, email: string, apiKey: string, timeoutMs: number): Promise<unknown> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: 'GET',
      headers: {
        'Authorization': basicAuth(email, apiKey),
        'Accept': 'application/json',
      },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    const reason = error instanceof Error && error.name === 'TimeoutError'
      ? `timed out after ${timeoutMs}ms`
      : errorMessage(error);
    throw new FetchError('NetworkError', `Could not reach Jira: ${reason}`, { cause: error });
  }

  const { status } = response;
  if (status === 401 || status === 403) {
    throw new FetchError('AuthError', `Jira rejected the credentials (${status})`, { status });
  }
  if (status === 404) {
    throw new FetchError('NotFoundError', 'Jira returned 404: not found or no access', { status });
  }
  if (!response.ok) {
    throw new FetchError('UnexpectedResponseError', `Jira API error (${status})`, { status });
  }

  try {
    return await response.json();
  } catch (error) {
    throw new FetchError('UnexpectedResponseError', 'Jira returned a response that is not JSON', { status, cause: error });
  }
}

/**
 * Fetch an issue and read only its summary field
 */
export async function fetchIssueSummary(options: FetchSummaryOptions): Promise<string> {
  const { domain, credential, issueKey, apiVersion, timeoutMs } = options;
  const url = issueUrl(domain, credential, issueKey, apiVersion);
  const data = await jiraGet(url, credential.email, credential.apiKey, timeoutMs);

  const parsed = issueSummarySchema.safeParse(data);
  if (!parsed.success) {
    throw new FetchError('UnexpectedResponseError', `Jira response for ${issueKey} has no summary field`);
  }
  return parsed.data.fields.summary;
}

/**
 * Resolve the site's cloud id from tenant_info
 */
export async function fetchCloudId(domain: string, email: string, apiKey: string, timeoutMs: number): Promise<string> {
  const data = await jiraGet(`${siteUrl(domain)}/_edge/tenant_info`, email, apiKey, timeoutMs);

  const parsed = tenantInfoSchema.safeParse(data);
  if (!parsed.success) {
    throw new FetchError('UnexpectedResponseError', `tenant_info for ${domain} has no cloudId`);
  }
  return parsed.data.cloudId;
}

/**
 * Check the credentials against /myself and return the account's display name
 */
export async function verifyCredentials(
  credential: Credential,
  apiVersion: JiraApiVersion,
  timeoutMs: number
): Promise<string> {
  const url = `${apiBaseUrl(credential.domain, credential.cloudId, apiVersion)}/myself`;
  const data = await jiraGet(url, credential.email, credential.apiKey, timeoutMs);

  const parsed = myselfSchema.safeParse(data);
  if (!parsed.success) {
    throw new FetchError('UnexpectedResponseError', `Unexpected /myself response from ${credential.domain}`);
  }
  return parsed.data.displayName ?? parsed.data.accountId;
}
