import { Command } from 'commander';
import chalk from 'chalk';
import { AuthRequest, DEFAULT_USER_AGENT } from '../auth';
import { buildAuthProvider } from '../config/auth';
import { handleError } from '../errors/handler';
import { AppError, ErrorCode } from '../errors/types';
import { isQuiet, isVerbose } from '../utils/output';
import { withAuthOptions, toAuthOptions } from './auth-options';
import type { AuthFlags } from './auth-options';

const SECRET_HEADERS = new Set(['authorization', 'proxy-authorization', 'cookie']);
const MASK = '********';

interface InspectFlags extends AuthFlags {
  showSecrets?: boolean;
}

export interface HeaderLine {
  name: string;
  value: string;
}

function maskCredential(value: string): string {
  const space = value.indexOf(' ');
  return space === -1 ? MASK : `${value.slice(0, space)} ${MASK}`;
}

function maskCookies(value: string): string {
  return value
    .split(';')
    .map((pair) => {
      const trimmed = pair.trim();
      const eq = trimmed.indexOf('=');
      return eq === -1 ? MASK : `${trimmed.slice(0, eq)}=${MASK}`;
    })
    .join('; ');
}

/**
 * Headers of a decorated request, sorted by name, with secret values
 * masked unless `showSecrets` is set.
 */
export function describeRequest(request: AuthRequest, showSecrets: boolean = false): HeaderLine[] {
  return Object.entries(request.headers())
    .sort(([a], [b]) => a.toLowerCase().localeCompare(b.toLowerCase()))
    .map(([name, value]) => {
      const key = name.toLowerCase();
      if (showSecrets || !SECRET_HEADERS.has(key)) {
        return { name, value };
      }
      return { name, value: key === 'cookie' ? maskCookies(value) : maskCredential(value) };
    });
}

function assertUrl(url: string): void {
  try {
    new URL(url);
  } catch {
    throw new AppError(`Invalid URL: ${url}`, ErrorCode.INVALID_ARGUMENT, { url });
  }
}

/**
 * Create the inspect command
 */
export function createInspectCommand(): Command {
  return withAuthOptions(
    new Command('inspect')
      .description('Show the headers and cookies that would be sent for a URL')
      .argument('<url>', 'URL to decorate (nothing is sent)')
      .option('--show-secrets', 'Print credential values instead of masking them')
  ).action(inspectCommand);
}

function inspectCommand(url: string, options: InspectFlags): void {
  try {
    assertUrl(url);
    const provider = buildAuthProvider(toAuthOptions(options));
    const request = new AuthRequest(url, { 'User-Agent': DEFAULT_USER_AGENT });
    provider.apply(request);

    if (isVerbose()) {
      console.log(chalk.dim(`Authentication: ${provider.type}`));
      console.log(chalk.dim(`GET ${request.url}`));
    }

    for (const line of describeRequest(request, options.showSecrets)) {
      console.log(isQuiet() ? `${line.name}: ${line.value}` : `${chalk.cyan(`${line.name}:`)} ${line.value}`);
    }
  } catch (error) {
    handleError(error, process.env.DEBUG === 'true');
    process.exit(1);
  }
}
