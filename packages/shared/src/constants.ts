/** Candidate count at which batch and top-K matching switch to the fan-out path. */
export const DEFAULT_PARALLEL_THRESHOLD = 1000;

/** Number of results the CLI prints when `--top` is not given. */
export const DEFAULT_TOP_K = 20;

/** Upper bound on the number of paths a candidate listing returns. */
export const DEFAULT_MAX_FILES = 50_000;
