/**
 * Listing Validator CLI - command definition
 */

import { Command, Option } from 'commander';
import { ListingValidatorError, formatFatalError } from '../errors/index.js';
import { createLogger } from '../logger/index.js';
import { runValidation, type ValidationStreams } from '../validate.js';

const VERSION = '0.1.0';

const log = createLogger('cli');

interface CliOptions {
  fastlanePath: string;
  enableGaAnnotations: boolean;
  checkLocales: boolean;
  format: string;
}

export function createProgram(
  streams: ValidationStreams = { out: process.stdout, err: process.stderr },
  setExitCode: (code: number) => void = (code) => {
    process.exitCode = code;
  },
): Command {
  const program = new Command();

  program
    .name('listing-validator')
    .description('Validate fastlane Google Play listing metadata without store credentials')
    .version(VERSION)
    .option('--fastlane-path <path>', 'Path to the fastlane directory', './fastlane')
    .option('--enable-ga-annotations', 'Emit GitHub Actions file annotations', false)
    .option('--check-locales', 'Reject locale directories Google Play does not know', false)
    .addOption(
      new Option('--format <format>', 'Report format').choices(['text', 'json']).default('text'),
    )
    .action((opts: CliOptions) => {
      try {
        const { exitCode } = runValidation(opts, streams);
        setExitCode(exitCode);
      } catch (err) {
        if (!(err instanceof ListingValidatorError)) throw err;
        log.error({ code: err.code, details: err.details }, err.message);
        streams.err.write(formatFatalError(err) + '\n');
        setExitCode(1);
      }
    });

  return program;
}
