/**
 * Main CLI setup using Commander.js
 *
 * Parses process flags, prepares the session and hands over to the prompt loop.
 */
import { Command, CommanderError, InvalidArgumentError, Option } from "commander";
import { ReconSession, resolveReconPolicy } from "@kafkarecon/core";
import { loadConfigFile } from "./commands/config.js";
import { toCliError } from "./errors.js";
import { formatCliError } from "./formatter.js";
import { runRepl } from "./repl.js";
import { createDefaultDependencies } from "./services/defaults.js";
import { EXIT_CODES, type CliDependencies, type ExitCode, type ReconOptions } from "./types.js";

/**
 * CLI name
 */
export const CLI_NAME = "kafkarecon";

function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

/**
 * Create the main CLI program. `onStart` receives the parsed options.
 */
export function createProgram(deps: CliDependencies, onStart: (options: ReconOptions) => Promise<void>): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description("Interactive Kafka cluster reconnaissance")
    .version(deps.version, "-V, --version", "Output the version number")
    .helpOption("-h, --help", "Display help for command")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => deps.io.out(text.trimEnd()),
      writeErr: (text) => deps.io.err(text.trimEnd()),
    })
    .addHelpText(
      "after",
      `
Examples:
  $ kafkarecon                          Start with an empty configuration
  $ kafkarecon -c client.json           Load client properties first
  $ kafkarecon -c client.yaml -t 5000   Give up on network calls after 5s`
    );

  program
    .addOption(new Option("-c, --config <path>", "Kafka client configuration file (JSON or YAML)"))
    .addOption(
      new Option("-t, --timeout <ms>", "Timeout for each network call").argParser(parsePositiveInteger)
    )
    .addOption(
      new Option("--name-width <n>", "Maximum width of configuration names").argParser(parsePositiveInteger)
    )
    .addOption(
      new Option("--value-width <n>", "Maximum width of configuration values").argParser(parsePositiveInteger)
    )
    .addOption(new Option("-v, --verbose", "Enable verbose output").default(false))
    .addOption(new Option("-q, --quiet", "Minimize output (only errors)").default(false))
    .addOption(new Option("--no-color", "Disable color output"))
    .action(async () => {
      await onStart(program.opts<ReconOptions>());
    });

  return program;
}

/**
 * Prepares the session from the parsed options and runs the prompt until it
 * ends. Client handles still held at that point are released.
 */
export async function startRecon(options: ReconOptions, deps: CliDependencies): Promise<ExitCode> {
  deps.logger.configure({
    verbose: options.verbose,
    quiet: options.quiet,
    noColor: options.color === false ? true : undefined,
  });

  const policy = resolveReconPolicy({
    timeoutMs: options.timeout,
    nameWidth: options.nameWidth,
    valueWidth: options.valueWidth,
  });
  const factory = deps.createClientFactory({
    timeoutMs: policy.timeoutMs,
    debug: (message, data) => deps.logger.debug(message, data),
  });
  const session = new ReconSession({ factory, policy });

  if (options.config !== undefined) {
    await loadConfigFile({ session, deps }, options.config);
  } else {
    deps.logger.info("Started without initial configuration");
  }

  try {
    return await runRepl(session, deps, deps.createLineReader());
  } finally {
    for (const diagnostic of await session.dispose()) {
      deps.logger.debug(diagnostic.message);
    }
  }
}

/**
 * Run the CLI program and resolve with the process exit code
 */
export async function run(argv: string[], deps: CliDependencies = createDefaultDependencies()): Promise<ExitCode> {
  let exitCode: ExitCode = EXIT_CODES.SUCCESS;
  const program = createProgram(deps, async (options) => {
    exitCode = await startRecon(options, deps);
  });

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.INVALID_ARGUMENT;
    }
    const cliError = toCliError(error);
    deps.logger.error(formatCliError(cliError));
    return cliError.exitCode;
  }

  return exitCode;
}
