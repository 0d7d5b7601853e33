import chalk from 'chalk';

// Diagnostics go to stderr: stdout is reserved for what the shell prompt renders
const colors = {
  primary: chalk.hex('#88C0D0'),      // Frost blue
  secondary: chalk.hex('#81A1C1'),    // Lighter blue
  accent: chalk.hex('#EBCB8B'),       // Yellow/gold
  success: chalk.hex('#A3BE8C'),      // Green
  warning: chalk.hex('#D08770'),      // Orange
  muted: chalk.hex('#4C566A'),        // Dark gray
};

const icons = {
  arrow: '›',
  check: '✓',
  cross: '✗',
  bang: '!',
};

let debugEnabled = false;

export function setDebug(enabled: boolean): void {
  debugEnabled = enabled;
}

function write(line: string): void {
  process.stderr.write(`${line}\n`);
}

export function displaySuccess(message: string): void {
  write(colors.success(`${icons.check} ${message}`));
}

export function displayError(message: string): void {
  write(colors.warning(`${icons.cross} ${message}`));
}

export function displayWarning(message: string): void {
  write(colors.accent(`${icons.bang} ${message}`));
}

export function displayInfo(message: string): void {
  write(colors.secondary(`${icons.arrow} ${message}`));
}

export function displayDebug(message: string): void {
  if (!debugEnabled) return;
  write(colors.muted(`[debug] ${message}`));
}

export function displayDomainList(domains: Array<{ domain: string; email: string }>): void {
  if (domains.length === 0) {
    displayInfo('No domains registered yet. Use --register-secrets <domain> <email> <api_key>.');
    return;
  }
  for (const { domain, email } of domains) {
    process.stdout.write(`${colors.primary.bold(domain)} ${colors.muted(email)}\n`);
  }
}
