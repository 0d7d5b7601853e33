const DOMAIN_PATTERN = /^[a-z0-9][a-z0-9-]*$/;

/**
 * Accept "acme", "acme.atlassian.net" or "https://acme.atlassian.net/" and
 * return the site subdomain ("acme"), or null if it isn't one.
 */
export function normalizeDomain(input: string): string | null {
  const domain = input
    .trim()
    .toLowerCase()
    .replace(/^https?:\/\//, '')
    .replace(/\/.*$/, '')
    .replace(/\.atlassian\.net$/, '');

  return DOMAIN_PATTERN.test(domain) ? domain : null;
}
