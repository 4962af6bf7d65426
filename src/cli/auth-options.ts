import { Command, Option } from 'commander';
import type { AuthOptions } from '../config/auth';

/**
 * Add the authentication flags shared by every command. Flags win over the
 * environment variables named beside them.
 */
export function withAuthOptions(command: Command): Command {
  return command
    .addOption(new Option('-b, --auth-bearer <token>', 'Bearer token authentication').env('AUTH_BEARER'))
    .addOption(new Option('-B, --auth-basic <user:pass>', 'Basic auth (format: username:password)').env('AUTH_BASIC'))
    .addOption(new Option('-H, --auth-header <value>', 'Custom Authorization header value').env('AUTH_HEADER'))
    .option('--headers-file <path>', "File with custom headers (format: 'Name: value')")
    .option('-C, --cookies-file <path>', "File with cookies (format: 'name=value')")
    .addOption(new Option('-c, --cookie <cookies>', "Cookie string (format: 'name1=value1; name2=value2')").env('COOKIE'))
    .addOption(new Option('-u, --user-agent <agent>', 'Custom User-Agent header').env('USER_AGENT'));
}

export interface AuthFlags {
  authBearer?: string;
  authBasic?: string;
  authHeader?: string;
  headersFile?: string;
  cookiesFile?: string;
  cookie?: string;
  userAgent?: string;
}

export function toAuthOptions(flags: AuthFlags): AuthOptions {
  return {
    bearer: flags.authBearer,
    basic: flags.authBasic,
    authHeader: flags.authHeader,
    headersFile: flags.headersFile,
    cookiesFile: flags.cookiesFile,
    cookie: flags.cookie,
    userAgent: flags.userAgent,
  };
}
