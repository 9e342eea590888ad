import * as fc from 'fast-check';

// Define defaults
const DEFAULT_NUM_RUNS = 100;
const DEFAULT_VERBOSE = false;

function readPositiveInt(value: string | undefined, fallback: number): number {
  const parsed = value === undefined ? NaN : parseInt(value, 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

// Get configuration from environment variables if available
const numRuns = readPositiveInt(process.env.FAST_CHECK_NUM_RUNS, DEFAULT_NUM_RUNS);

const verbose = process.env.FAST_CHECK_VERBOSE
  ? process.env.FAST_CHECK_VERBOSE === 'true'
  : DEFAULT_VERBOSE;

// Replays a failing run reported by fast-check
const seed = process.env.FAST_CHECK_SEED ? parseInt(process.env.FAST_CHECK_SEED, 10) : undefined;

fc.configureGlobal({
  numRuns,
  verbose,
  ...(seed !== undefined && Number.isInteger(seed) ? { seed } : {}),
});

export const propertyTestConfig = {
  numRuns,
  verbose,
  seed,
};
