import { LOG_LEVEL_MAP } from '@subseq/shared/config-schema';
import { initLogger, logger } from '@subseq/shared/logger';
import { HELP_TEXT, USAGE, UsageError, parseCliArgs, type CliCommand } from './args.js';
import { env } from './env.js';
import { runSearch } from './search.js';

/** Where result lines and help text go. */
export interface CliOutput {
  write(line: string): void;
}

const consoleOutput: CliOutput = {
  write: (line) => console.log(line),
};

/**
 * Run one `subseq` invocation.
 *
 * @param argv - Arguments after the executable and script path
 * @returns The process exit code
 */
export async function main(argv: string[], output: CliOutput = consoleOutput): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArgs(argv, env.SUBSEQ_LOG_LEVEL);
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    logger.error(`[cli] ${err.message}`);
    output.write(USAGE);
    return 1;
  }

  if (command.kind === 'help') {
    output.write(HELP_TEXT);
    return 0;
  }

  const { config } = command;
  initLogger({ level: LOG_LEVEL_MAP[config.logging.level], logFile: env.SUBSEQ_LOG_FILE });
  logger.debug(`[cli] searching ${config.root} for "${config.query}"`);

  try {
    const { lines } = await runSearch(config);
    for (const line of lines) output.write(line);
    return 0;
  } catch (err) {
    logger.error(`[cli] ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
}
