import { Command } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import process from 'process';
import chalk from 'chalk';
import ora from 'ora';
import { loadEnvironment } from './config.js';
import { buildApp, runDemo } from './core/demo.js';
import { PathGuard } from './services/path-guard.js';
import { checkUserInput, sanitizeInput } from './utils/security.js';
import { ErrorType } from './types/error-handler.js';
import { SecureError, withErrorHandling } from './utils/error-handler.js';
import { logger, setLogLevel } from './utils/logger.js';
import { ERROR_MESSAGES, INFO_MESSAGES } from './constants/messages.js';
import type { AuthenticatedEnvironment } from './schemas/validation.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJson: { version: string } = JSON.parse(readFileSync(join(__dirname, '../package.json'), 'utf-8'));

const requireApiKey = (): AuthenticatedEnvironment => {
  const environment = loadEnvironment();
  setLogLevel(environment.logLevel);

  const { apiKey } = environment;
  if (!apiKey) {
    throw new SecureError(ERROR_MESSAGES.API_KEY_NOT_FOUND, ErrorType.INVALID_CONFIG, {
      operation: 'loadEnvironment',
    });
  }

  return { ...environment, apiKey };
};

export const createProgram = (): Command => {
  const program = new Command();

  program
    .name('sapi')
    .description('Validated API client with advisory input and path checks')
    .version(packageJson.version);

  // No subcommand: run the sample flow against API_BASE_URL
  program.action(async (): Promise<void> => {
    await withErrorHandling(
      async (): Promise<void> => {
        await runDemo();
      },
      { operation: 'demo' }
    );
  });

  program
    .command('user <id>')
    .description('Fetch a user by id')
    .action(async (id: string): Promise<void> => {
      await withErrorHandling(
        async (): Promise<void> => {
          const app = buildApp(requireApiKey());
          const spinner = ora(`${INFO_MESSAGES.FETCHING_USER} ${id}...`).start();

          try {
            const user = await app.processUserRequest(id, id);
            spinner.succeed(INFO_MESSAGES.USER_RETRIEVED);
            console.log(JSON.stringify(user, null, 2));
          } catch (error) {
            spinner.fail();
            throw error;
          }
        },
        { operation: 'user', userId: id }
      );
    });

  program
    .command('check <input>')
    .description('Run input through the dangerous-pattern denylist (advisory)')
    .action((input: string): void => {
      const result = checkUserInput(input);

      if (result.isValid) {
        console.log(chalk.green(`✅ ${INFO_MESSAGES.INPUT_ACCEPTED}`));
        return;
      }

      console.log(chalk.red(`❌ ${result.error}`));
      console.log(`${INFO_MESSAGES.SANITIZED_INPUT} ${sanitizeInput(input)}`);
      process.exitCode = 1;
    });

  program
    .command('read <path>')
    .description('Read a UTF-8 file from inside ALLOWED_ROOT')
    .option('--segment', 'Compare whole path segments instead of a string prefix')
    .action(async (filePath: string, options: { segment?: boolean }): Promise<void> => {
      await withErrorHandling(
        async (): Promise<void> => {
          const environment = loadEnvironment();
          setLogLevel(environment.logLevel);

          const guard = new PathGuard({
            allowedRoot: environment.allowedRoot,
            containment: options.segment ? 'segment' : 'prefix',
          });
          const content = await guard.safeRead(filePath);

          if (content === null) {
            logger.error(`Could not read ${filePath}`);
            process.exitCode = 1;
            return;
          }

          process.stdout.write(content);
        },
        { operation: 'read', file: filePath }
      );
    });

  return program;
};

/**
 * Parses `argv` and runs the matching command. Failures end up in
 * `process.exitCode`; a {@link SecureError} has already been reported by the
 * error handler by the time it gets here.
 */
export const runCli = async (argv: string[]): Promise<void> => {
  try {
    await createProgram().parseAsync(argv);
  } catch (error) {
    if (!(error instanceof SecureError)) {
      logger.error('Unexpected failure:', error);
    }
    process.exitCode = 1;
  }
};
