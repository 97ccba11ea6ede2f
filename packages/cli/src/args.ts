import { parseArgs } from 'node:util';
import path from 'path';
import type { ZodError } from 'zod';
import { DEFAULT_TOP_K } from '@subseq/shared/constants';
import { SearchConfigSchema, type SearchConfig } from '@subseq/shared/config-schema';

/**
 * Command-line parsing for `subseq`.
 *
 * Turns argv into a validated {@link SearchConfig}. Precedence for the log
 * level is: `--log-level` flag, then `SUBSEQ_LOG_LEVEL`, then `info`.
 *
 * @module cli/args
 */

export const USAGE = 'Usage: subseq <query> [options]';

export const HELP_TEXT = `
${USAGE}

Fuzzy-match <query> against the file paths under a directory and print the
best matches, one "score<TAB>path" line each.

Options:
  -d, --dir <path>         Directory to search (default: current directory)
  -k, --top <n>            Number of results (default: ${DEFAULT_TOP_K})
  -w, --word-mode          Score word starts instead of path-segment starts
  -c, --case-sensitive     Match case exactly
      --dirs               Include directories in the candidates
  -t, --timeout <ms>       Stop listing candidates after this many milliseconds
  -l, --log-level <level>  Log level (fatal|error|warn|info|debug|trace)
  -h, --help               Show this help message

Environment:
  SUBSEQ_LOG_LEVEL   Log level when --log-level is not given
  SUBSEQ_LOG_FILE    Also append NDJSON log entries to this file

Examples:
  subseq idx
  subseq -k 5 --dir ~/projects/app cfgload
  subseq --dirs -w src
`;

/** Invalid command line: a missing query or a bad option value. */
export class UsageError extends Error {
  readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'UsageError';
    this.code = code;
  }
}

export type CliCommand = { kind: 'help' } | { kind: 'search'; config: SearchConfig };

function readArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      dir: { type: 'string', short: 'd' },
      top: { type: 'string', short: 'k' },
      'word-mode': { type: 'boolean', short: 'w', default: false },
      'case-sensitive': { type: 'boolean', short: 'c', default: false },
      dirs: { type: 'boolean', default: false },
      timeout: { type: 'string', short: 't' },
      'log-level': { type: 'string', short: 'l' },
      help: { type: 'boolean', short: 'h', default: false },
    },
    allowPositionals: true,
  });
}

/** Numeric flags stay `undefined` when absent so schema defaults apply. */
function toNumber(raw: string | undefined): number | undefined {
  return raw === undefined ? undefined : Number(raw);
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || 'input'}: ${issue.message}`)
    .join('; ');
}

/**
 * Parse and validate a `subseq` command line.
 *
 * @param argv - Arguments after the executable and script path
 * @param envLogLevel - `SUBSEQ_LOG_LEVEL`, used when no flag is given
 * @param cwd - Base for resolving `--dir`
 * @throws UsageError with code `INVALID_OPTION` or `MISSING_QUERY`
 */
export function parseCliArgs(
  argv: string[],
  envLogLevel?: string,
  cwd: string = process.cwd(),
): CliCommand {
  let parsed: ReturnType<typeof readArgs>;
  try {
    parsed = readArgs(argv);
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err), 'INVALID_OPTION');
  }
  const { values, positionals } = parsed;

  if (values.help) return { kind: 'help' };

  if (positionals.length === 0) throw new UsageError('Missing <query>', 'MISSING_QUERY');
  if (positionals.length > 1) {
    throw new UsageError(
      `Expected a single <query>, got ${positionals.length} arguments`,
      'INVALID_OPTION',
    );
  }

  const result = SearchConfigSchema.safeParse({
    query: positionals[0],
    root: path.resolve(cwd, values.dir ?? '.'),
    top: toNumber(values.top),
    includeDirectories: values.dirs,
    timeoutMs: toNumber(values.timeout) ?? null,
    matcher: {
      caseSensitive: values['case-sensitive'],
      pathMode: !values['word-mode'],
    },
    logging: { level: values['log-level'] ?? envLogLevel ?? 'info' },
  });
  if (!result.success) throw new UsageError(formatIssues(result.error), 'INVALID_OPTION');

  return { kind: 'search', config: result.data };
}
