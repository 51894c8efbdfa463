import { describe, expect, it } from "vitest";
import { parseArgs } from "./args";

describe("parseArgs", () => {
  it("defaults to a single run", () => {
    expect(parseArgs([])).toEqual({
      mode: "once",
      retryFailed: false,
      limit: undefined,
      concurrency: undefined,
      queries: undefined,
    });
  });

  it("reads schedule mode with repeated queries", () => {
    expect(
      parseArgs(["--schedule", "--limit", "2", "--query", " gene therapy ", "--query", "latest", "--retry-failed"]),
    ).toEqual({
      mode: "schedule",
      retryFailed: true,
      limit: 2,
      concurrency: undefined,
      queries: ["gene therapy", "latest"],
    });
  });

  it("returns status mode regardless of other flags", () => {
    expect(parseArgs(["--limit", "3", "--status"])).toEqual({ mode: "status" });
  });

  it("rejects a non-positive limit", () => {
    expect(() => parseArgs(["--limit", "0"])).toThrow("`--limit` must be a positive integer. Got: 0");
  });

  it("rejects a fractional concurrency", () => {
    expect(() => parseArgs(["--concurrency", "1.5"])).toThrow("`--concurrency` must be a positive integer. Got: 1.5");
  });

  it("rejects conflicting modes", () => {
    expect(() => parseArgs(["--schedule", "--once"])).toThrow("`--schedule` and `--once` cannot be combined.");
  });
});
