#!/usr/bin/env node

import { config as loadEnv } from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { existsSync } from 'fs';
import { Command } from 'commander';

// Load .env from the CLI installation directory
const __dirname = dirname(fileURLToPath(import.meta.url));
const envPaths = [
  join(__dirname, '../.env'),           // When running from dist/
  join(process.cwd(), '.env'),          // Current working directory
];

for (const envPath of envPaths) {
  if (existsSync(envPath)) {
    loadEnv({ path: envPath });
    break;
  }
}

import { ConfigError, loadConfig } from './config.js';
import { ExitCode, errorMessage } from './errors.js';
import type { CommandResult } from './types.js';
import {
  type CommandDeps,
  DEFAULT_FORMAT,
  clearCache,
  createDeps,
  listDomains,
  registerProject,
  registerSecrets,
  unregisterProject,
  unregisterSecrets,
  viewGitIssue,
} from './commands.js';
import { displayError, setDebug } from './ui/display.js';

interface CliOptions {
  registerSecrets?: string[];
  skipVerify?: boolean;
  registerProject?: string;
  viewGitIssue?: boolean;
  format: string;
  unregisterSecrets?: string;
  unregisterProject?: boolean;
  clearCache?: boolean;
  listDomains?: boolean;
}

const program = new Command();

program
  .name('jira-git-issue')
  .description('Jira issue viewing utility with git branches')
  .version('1.0.0')
  .option('--register-secrets <domain_email_api_key...>', 'Register Jira domain, email, and API key')
  .option('--skip-verify', 'With --register-secrets: save without checking the credentials against Jira')
  .option('--register-project <domain>', 'Register Jira domain for the current git project')
  .option('--view-git-issue', 'View the current Jira issue based on the current git branch name')
  .option('--format <template>', 'With --view-git-issue: output template using {key} and {summary}', DEFAULT_FORMAT)
  .option('--unregister-secrets <domain>', 'Remove the stored credentials for a domain')
  .option('--unregister-project', 'Remove the Jira domain binding of the current git project')
  .option('--clear-cache', 'Forget all cached issue summaries')
  .option('--list-domains', 'List domains with stored credentials')
  .action(async () => {
    const options = program.opts<CliOptions>();
    const result = await run(options);
    if (result.stdout) {
      process.stdout.write(`${result.stdout}\n`);
    }
    process.exitCode = result.exitCode;
  });

async function run(options: CliOptions): Promise<CommandResult> {
  let deps: CommandDeps;
  try {
    const config = loadConfig();
    setDebug(config.debug);
    deps = createDeps(config);
  } catch (error) {
    if (error instanceof ConfigError) {
      displayError(error.message);
      return { exitCode: ExitCode.Failure };
    }
    throw error;
  }

  if (options.registerSecrets) {
    if (options.registerSecrets.length !== 3) {
      displayError('--register-secrets takes exactly three values: <domain> <email> <api_key>');
      return { exitCode: ExitCode.Failure };
    }
    const [domain, email, apiKey] = options.registerSecrets;
    return registerSecrets(deps, { domain, email, apiKey, verify: !options.skipVerify });
  }
  if (options.registerProject) {
    return registerProject(deps, options.registerProject);
  }
  if (options.viewGitIssue) {
    return viewGitIssue(deps, { format: options.format });
  }
  if (options.unregisterSecrets) {
    return unregisterSecrets(deps, options.unregisterSecrets);
  }
  if (options.unregisterProject) {
    return unregisterProject(deps);
  }
  if (options.clearCache) {
    return clearCache(deps);
  }
  if (options.listDomains) {
    return listDomains(deps);
  }

  program.outputHelp({ error: true });
  return { exitCode: ExitCode.Failure };
}

program.parseAsync().catch((error: unknown) => {
  displayError(errorMessage(error));
  process.exitCode = ExitCode.Failure;
});
