import { execFile } from 'child_process';
import { promisify } from 'util';
import fs from 'fs/promises';
import type { Dirent } from 'fs';
import path from 'path';
import { DEFAULT_MAX_FILES } from '@subseq/shared/constants';
import { logger } from '@subseq/shared/logger';
import type { CandidateListing } from '@subseq/shared/types';
import ignorePkg from 'ignore';

/**
 * Candidate listing for matching file paths under a root directory.
 *
 * Tries `git ls-files` first, falls back to a breadth-first readdir walk that
 * honors the `.gitignore` of every directory it enters. Both are bounded by an
 * optional time budget, and the walk by a file cap; either limit yields a
 * partial listing rather than an error.
 *
 * @module source/candidate-source
 */
const execFileAsync = promisify(execFile);

// CommonJS package: the factory is module.exports, typed as its default export
const createIgnore = ignorePkg.default;
type IgnoreRules = ReturnType<typeof createIgnore>;

/** Output cap for `git ls-files`, in bytes. */
const GIT_MAX_BUFFER = 64 * 1024 * 1024;

/** Directories never descended into by the readdir walk. */
export const EXCLUDED_DIRS = new Set([
  'node_modules',
  '.git',
  'dist',
  'build',
  '.cache',
  '__pycache__',
  '.venv',
  'venv',
  '.tox',
]);

/** Thrown when the root directory itself cannot be listed. */
export class CandidateSourceError extends Error {
  readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'CandidateSourceError';
    this.code = code;
  }
}

export interface ListCandidatesOptions {
  /** Also list directories, with a trailing `/` (default: false). */
  includeDirectories?: boolean;
  /** Abandon `git ls-files`, or stop the readdir walk, once this many milliseconds have elapsed. */
  maxDurationMs?: number;
  /** Keep at most this many paths (default: 50 000). */
  maxFiles?: number;
  /** Clock used for the time budget (default: `Date.now`). */
  now?: () => number;
}

interface WalkOptions {
  includeDirectories: boolean;
  maxFiles: number;
  now: () => number;
  maxDurationMs?: number;
  startedAt: number;
}

interface WalkResult {
  paths: string[];
  timedOut: boolean;
}

/** The rules of one `.gitignore`, matched against paths relative to its directory. */
interface IgnoreScope {
  base: string;
  rules: IgnoreRules;
}

interface PendingDirectory {
  prefix: string;
  /** Scopes of the enclosing directories, outermost first. */
  scopes: IgnoreScope[];
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function byName(a: Dirent, b: Dirent): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

/** Insert each file's unseen ancestor directories just before it. */
function withAncestorDirectories(files: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const file of files) {
    const segments = file.split('/');
    for (let depth = 1; depth < segments.length; depth++) {
      const dir = `${segments.slice(0, depth).join('/')}/`;
      if (seen.has(dir)) continue;
      seen.add(dir);
      result.push(dir);
    }
    result.push(file);
  }
  return result;
}

async function assertReadableRoot(root: string): Promise<void> {
  const stats = await fs.stat(root).catch((err: unknown) => {
    throw new CandidateSourceError(
      `Cannot read root ${root}: ${describeError(err)}`,
      'ROOT_UNREADABLE',
    );
  });
  if (!stats.isDirectory()) {
    throw new CandidateSourceError(`Root ${root} is not a directory`, 'ROOT_UNREADABLE');
  }
}

/**
 * Run `git ls-files`. With a `timeoutMs`, resolves `null` once it elapses and
 * kills the git process.
 */
async function listViaGit(root: string, timeoutMs?: number): Promise<string[] | null> {
  const controller = new AbortController();
  const listing = execFileAsync(
    'git',
    ['ls-files', '--cached', '--others', '--exclude-standard'],
    { cwd: root, maxBuffer: GIT_MAX_BUFFER, signal: controller.signal },
  ).then(({ stdout }) => stdout.split('\n').filter(Boolean));
  if (timeoutMs === undefined) return listing;

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<null>((resolve) => {
    timer = setTimeout(() => {
      controller.abort();
      resolve(null);
    }, Math.max(0, timeoutMs));
  });
  try {
    return await Promise.race([listing, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

async function loadIgnoreScope(root: string, base: string): Promise<IgnoreScope | null> {
  const file = path.join(root, base, '.gitignore');
  try {
    return { base, rules: createIgnore().add(await fs.readFile(file, 'utf8')) };
  } catch (err) {
    logger.debug(`[source] skipping unreadable ${file}: ${describeError(err)}`);
    return null;
  }
}

/**
 * Apply every scope from the root down; a deeper negation re-includes what an
 * outer file excluded.
 */
function isIgnored(scopes: readonly IgnoreScope[], rel: string, isDirectory: boolean): boolean {
  let ignored = false;
  for (const { base, rules } of scopes) {
    const local = (base ? rel.slice(base.length + 1) : rel) + (isDirectory ? '/' : '');
    const verdict = rules.test(local);
    if (verdict.ignored) ignored = true;
    else if (verdict.unignored) ignored = false;
  }
  return ignored;
}

async function listViaReaddir(root: string, options: WalkOptions): Promise<WalkResult> {
  const { includeDirectories, maxFiles, now, maxDurationMs, startedAt } = options;
  const paths: string[] = [];
  const queue: PendingDirectory[] = [{ prefix: '', scopes: [] }];

  while (queue.length > 0) {
    if (maxDurationMs !== undefined && now() - startedAt > maxDurationMs) {
      logger.debug(`[source] walk of ${root} stopped after ${maxDurationMs}ms`);
      return { paths, timedOut: true };
    }

    const next = queue.shift();
    if (next === undefined) break;
    const { prefix } = next;

    let entries: Dirent[];
    try {
      entries = await fs.readdir(path.join(root, prefix), { withFileTypes: true });
    } catch (err) {
      logger.debug(`[source] skipping ${prefix || '.'}: ${describeError(err)}`);
      continue;
    }

    let scopes = next.scopes;
    if (entries.some((entry) => entry.isFile() && entry.name === '.gitignore')) {
      const own = await loadIgnoreScope(root, prefix);
      if (own) scopes = [...scopes, own];
    }

    for (const entry of entries.sort(byName)) {
      const rel = prefix ? `${prefix}/${entry.name}` : entry.name;
      if (entry.isDirectory()) {
        if (EXCLUDED_DIRS.has(entry.name) || isIgnored(scopes, rel, true)) continue;
        if (includeDirectories) paths.push(`${rel}/`);
        queue.push({ prefix: rel, scopes });
      } else if (entry.isFile()) {
        if (isIgnored(scopes, rel, false)) continue;
        paths.push(rel);
      }
      // Symbolic links and special files are skipped.
      if (paths.length > maxFiles) return { paths, timedOut: false };
    }
  }

  return { paths, timedOut: false };
}

/**
 * List candidate paths under `root`, relative and `/`-separated.
 *
 * @param root - Directory to list
 * @param options - Directory inclusion and limits
 * @throws CandidateSourceError with code `ROOT_UNREADABLE` when `root` cannot be read
 */
export async function listCandidates(
  root: string,
  options: ListCandidatesOptions = {},
): Promise<CandidateListing> {
  const includeDirectories = options.includeDirectories ?? false;
  const maxFiles = options.maxFiles ?? DEFAULT_MAX_FILES;
  const now = options.now ?? Date.now;
  const startedAt = now();

  await assertReadableRoot(root);

  const gitBudget =
    options.maxDurationMs === undefined ? undefined : options.maxDurationMs - (now() - startedAt);

  let strategy: CandidateListing['strategy'];
  let walk: WalkResult;
  try {
    const files = await listViaGit(root, gitBudget);
    strategy = 'git';
    if (files === null) {
      logger.debug(`[source] git ls-files in ${root} gave up after ${options.maxDurationMs}ms`);
      walk = { paths: [], timedOut: true };
    } else {
      walk = {
        paths: includeDirectories ? withAncestorDirectories(files) : files,
        timedOut: false,
      };
    }
  } catch (err) {
    logger.debug(`[source] git ls-files failed in ${root}, walking instead: ${describeError(err)}`);
    strategy = 'readdir';
    walk = await listViaReaddir(root, {
      includeDirectories,
      maxFiles,
      now,
      maxDurationMs: options.maxDurationMs,
      startedAt,
    });
  }

  const truncated = walk.paths.length > maxFiles;
  const paths = truncated ? walk.paths.slice(0, maxFiles) : walk.paths;
  logger.debug(
    `[source] ${paths.length} candidates from ${strategy}${truncated ? ' (truncated)' : ''}${walk.timedOut ? ' (timed out)' : ''}`,
  );
  return { paths, truncated, timedOut: walk.timedOut, strategy };
}
