#!/usr/bin/env node
import { program } from 'commander';
import chalk from 'chalk';
import { version as pkgVersion } from '../package.json';
import { createCheckCommand } from './cli/check';
import { createInspectCommand } from './cli/inspect';
import { handleError } from './errors/handler';
import { logger, LogLevel } from './utils/logger';

process.on('unhandledRejection', (error: unknown) => {
  handleError(error, process.env.DEBUG === 'true');
  process.exit(1);
});

process.on('uncaughtException', (error: unknown) => {
  handleError(error, process.env.DEBUG === 'true');
  process.exit(1);
});

program
  .name('downurl')
  .description(
    chalk.blue.bold('downurl') +
    '\n\nConcurrent URL downloader: authentication tools.'
  )
  .version(pkgVersion, '-v, --version', 'Display version')
  .option('-d, --debug', 'Enable debug output')
  .option('--verbose', 'Show detailed output')
  .option('-q, --quiet', 'Suppress all non-error output')
  .hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts();

    if (opts.debug) {
      process.env.DEBUG = 'true';
      logger.setLevel(LogLevel.DEBUG);
    }

    if (opts.verbose) {
      process.env.VERBOSE = 'true';
    }

    // Quiet takes precedence
    if (opts.quiet) {
      process.env.QUIET = 'true';
      logger.setLevel(LogLevel.SILENT);
    }
  });

program.addCommand(createCheckCommand());
program.addCommand(createInspectCommand());

program.on('--help', () => {
  console.log('');
  console.log(chalk.bold('Authentication sources:'));
  console.log(`  ${chalk.dim('-b, --auth-bearer')}   AUTH_BEARER`);
  console.log(`  ${chalk.dim('-B, --auth-basic')}    AUTH_BASIC   (username:password)`);
  console.log(`  ${chalk.dim('-H, --auth-header')}   AUTH_HEADER`);
  console.log(`  ${chalk.dim('-c, --cookie')}        COOKIE       (name1=value1; name2=value2)`);
  console.log(`  ${chalk.dim('-u, --user-agent')}    USER_AGENT`);
  console.log('');
  console.log(chalk.bold('Examples:'));
  console.log('  $ downurl check --auth-bearer "$TOKEN"');
  console.log('  $ downurl inspect https://example.com/app.js --headers-file headers.txt -c "session=abc"');
  console.log('');
});

program.parse();
