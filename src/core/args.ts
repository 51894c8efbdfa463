import type { RunOptions } from "./runOptions";

const getArgValue = (argv: string[], key: string): string | undefined => {
  const index = argv.findIndex((arg) => arg === key);
  return index === -1 ? undefined : argv[index + 1];
};

const getArgValues = (argv: string[], key: string): string[] =>
  argv.flatMap((arg, index) => {
    const value = argv[index + 1];
    return arg === key && value !== undefined ? [value] : [];
  });

const parsePositiveInt = (value: string | undefined, key: string): number | undefined => {
  if (value === undefined) {
    return undefined;
  }

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`\`${key}\` must be a positive integer. Got: ${value}`);
  }

  return parsed;
};

export const parseArgs = (argv: string[]): RunOptions => {
  if (argv.includes("--status")) {
    return { mode: "status" };
  }

  if (argv.includes("--schedule") && argv.includes("--once")) {
    throw new Error("`--schedule` and `--once` cannot be combined.");
  }

  const queries = getArgValues(argv, "--query")
    .map((query) => query.trim())
    .filter((query) => query.length > 0);

  const shared = {
    retryFailed: argv.includes("--retry-failed"),
    limit: parsePositiveInt(getArgValue(argv, "--limit"), "--limit"),
    concurrency: parsePositiveInt(getArgValue(argv, "--concurrency"), "--concurrency"),
    queries: queries.length > 0 ? queries : undefined,
  };

  return argv.includes("--schedule") ? { mode: "schedule", ...shared } : { mode: "once", ...shared };
};
