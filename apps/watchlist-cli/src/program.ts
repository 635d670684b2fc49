import { Command, CommanderError, Option } from 'commander';
import { z } from 'zod';
import {
  convertUtcTimestamp,
  createWatchlistClient,
  stringifyRequestSummary,
  validateConfigFile,
  validateCredentials,
  writeRequestSummaryJson,
  writeRetrievedConfig,
  type HttpTransport,
  type Logger,
} from '@libs/watchlist-client';
import {
  RETRIEVE_ERROR_CAUSES,
  SUBMIT_ERROR_CAUSES,
  describeFailure,
} from './failures';

export const USERNAME_ENV = 'ICE_API_USERNAME';
export const PASSWORD_ENV = 'ICE_API_PASSWORD';

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
}

export interface CliDeps {
  io?: CliIo;
  /** Replaces global fetch; used by tests. */
  transport?: HttpTransport;
  /** Default output directory. */
  cwd?: string;
}

const consoleIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

/**
 * CLI options validated by Zod at CLI boundary. Credentials stay `unknown`
 * here; `validateCredentials` reports them.
 */
const CommonOptionsSchema = z.object({
  user: z.unknown().optional(),
  password: z.unknown().optional(),
  writeTo: z.string().min(1),
  verbose: z.boolean().default(false),
});

const SubmitOptionsSchema = CommonOptionsSchema.extend({
  quiet: z.boolean().default(false),
  json: z.boolean().default(false),
});

const RetrieveOptionsSchema = CommonOptionsSchema.extend({
  timestamp: z.string().optional(),
});

/**
 * Run the `watchlist` command line and resolve to the process exit code.
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const io = deps.io ?? consoleIo;
  const defaultDirectory = deps.cwd ?? process.cwd();
  let exitCode = 0;

  const verboseLogger = (enabled: boolean): Logger | undefined =>
    enabled
      ? {
          debug: (msg) => io.err(msg),
          warn: (msg) => io.err(msg),
        }
      : undefined;

  const program = new Command('watchlist')
    .description('Submit and retrieve Watchlist API source subscription configurations')
    .exitOverride()
    .configureOutput({
      writeOut: (str) => io.out(str.trimEnd()),
      writeErr: (str) => io.err(str.trimEnd()),
    });

  program
    .command('submit')
    .description(
      'Validate a configuration file and submit it to the Watchlist API. On success, ' +
        'report the sources that were activated, updated, failed or deactivated.',
    )
    .argument('<config-file>', 'path to the watchlist configuration file')
    .addOption(credentialOption('-u, --user <username>', 'username', USERNAME_ENV))
    .addOption(credentialOption('-p, --password <password>', 'password', PASSWORD_ENV))
    .option('-q, --quiet', 'do not display the summary of the performed actions')
    .option('--json', 'save the raw summary of the performed actions as JSON')
    .option('-w, --write-to <dir>', 'directory the JSON summary is written to', defaultDirectory)
    .option('--verbose', 'log requests to stderr')
    .action(async (configFile: string, rawOptions: unknown) => {
      const parsedOptions = SubmitOptionsSchema.safeParse(rawOptions);
      if (!parsedOptions.success) {
        io.out(`Invalid options: ${describeOptionIssues(parsedOptions.error)}`);
        exitCode = 1;
        return;
      }
      const options = parsedOptions.data;

      const credentials = validateCredentials(options.user, options.password);
      if (credentials.isErr()) {
        io.out(describeFailure(credentials.error));
        exitCode = 1;
        return;
      }

      const validation = await validateConfigFile(configFile);
      if (validation.isErr()) {
        io.out(`Invalid Configuration File: ${validation.error.message}`);
        exitCode = 1;
        return;
      }

      const client = createWatchlistClient(credentials.value, {
        transport: deps.transport,
        logger: verboseLogger(options.verbose),
      });
      const submitted = await client.submitConfig(configFile);
      if (submitted.isErr()) {
        io.out(describeFailure(submitted.error, SUBMIT_ERROR_CAUSES));
        exitCode = 1;
        return;
      }

      if (!options.quiet) {
        io.out(stringifyRequestSummary(submitted.value));
      }

      if (options.json) {
        const written = await writeRequestSummaryJson(submitted.value, options.writeTo);
        if (written.isErr()) {
          io.out(describeFailure(written.error));
          exitCode = 1;
          return;
        }
        io.out(
          'The summary of the actions performed as a result of the request has been written to: ' +
            `\n  ${written.value}`,
        );
      }
    });

  program
    .command('retrieve')
    .description(
      'Retrieve the active configuration, or with --timestamp the configuration that ' +
        'was active at that UTC date and time, and write it to a CSV file.',
    )
    .addOption(credentialOption('-u, --user <username>', 'username', USERNAME_ENV))
    .addOption(credentialOption('-p, --password <password>', 'password', PASSWORD_ENV))
    .option('-t, --timestamp <timestamp>', 'UTC timestamp in ISO 8601 (YYYY-mm-ddTHH:MM:SSZ)')
    .option(
      '-w, --write-to <dir>',
      'directory the retrieved configuration is written to',
      defaultDirectory,
    )
    .option('--verbose', 'log requests to stderr')
    .action(async (rawOptions: unknown) => {
      const parsedOptions = RetrieveOptionsSchema.safeParse(rawOptions);
      if (!parsedOptions.success) {
        io.out(`Invalid options: ${describeOptionIssues(parsedOptions.error)}`);
        exitCode = 1;
        return;
      }
      const options = parsedOptions.data;

      const credentials = validateCredentials(options.user, options.password);
      if (credentials.isErr()) {
        io.out(describeFailure(credentials.error));
        exitCode = 1;
        return;
      }

      // An empty -t asks for the active configuration.
      const timestamp = options.timestamp || undefined;
      if (timestamp !== undefined) {
        const checked = convertUtcTimestamp(timestamp);
        if (checked.isErr()) {
          io.out(`Invalid timestamp: ${checked.error.message}`);
          exitCode = 1;
          return;
        }
      }

      const client = createWatchlistClient(credentials.value, {
        transport: deps.transport,
        logger: verboseLogger(options.verbose),
      });
      const retrieved = await client.retrieveConfig(timestamp);
      if (retrieved.isErr()) {
        io.out(describeFailure(retrieved.error, RETRIEVE_ERROR_CAUSES));
        exitCode = 1;
        return;
      }

      const written = await writeRetrievedConfig(retrieved.value, options.writeTo);
      if (written.isErr()) {
        io.out(describeFailure(written.error));
        exitCode = 1;
        return;
      }
      io.out(`The retrieved configuration has been written to: \n  ${written.value}`);
    });

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }
  return exitCode;
}

function credentialOption(flags: string, name: string, envVar: string): Option {
  return new Option(flags, `the ${name} used to access the Watchlist API`).env(envVar);
}

function describeOptionIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
}
