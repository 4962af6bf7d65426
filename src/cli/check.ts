import { Command } from 'commander';
import chalk from 'chalk';
import type { AuthProvider } from '../auth';
import { buildAuthProvider } from '../config/auth';
import { handleError } from '../errors/handler';
import { normalLog } from '../utils/output';
import { withAuthOptions, toAuthOptions } from './auth-options';
import type { AuthFlags } from './auth-options';

export function summarizeProvider(provider: AuthProvider): string {
  return `${provider.type} (${provider.headerCount} header(s), ${provider.cookieCount} cookie(s))`;
}

/**
 * Create the check command
 */
export function createCheckCommand(): Command {
  return withAuthOptions(
    new Command('check').description('Validate the authentication options without sending anything')
  ).action(checkCommand);
}

function checkCommand(options: AuthFlags): void {
  try {
    const provider = buildAuthProvider(toAuthOptions(options));
    normalLog(chalk.green('✓ Authentication:'), summarizeProvider(provider));
  } catch (error) {
    handleError(error, process.env.DEBUG === 'true');
    process.exit(1);
  }
}
