export class PersistenceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PersistenceError";
  }
}

export class HttpStatusError extends Error {
  readonly status: number;

  constructor(url: string, status: number) {
    super(`Request to ${url} failed: HTTP ${status}`);
    this.name = "HttpStatusError";
    this.status = status;
  }
}

export class SchemaViolationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Generation output does not match schema: ${issues.join("; ")}`);
    this.name = "SchemaViolationError";
    this.issues = issues;
  }
}

export class RunLockedError extends Error {
  readonly ownerPid?: number;

  constructor(lockPath: string, ownerPid?: number) {
    super(`Another pipeline run holds ${lockPath}${ownerPid === undefined ? "" : ` (pid=${ownerPid})`}`);
    this.name = "RunLockedError";
    this.ownerPid = ownerPid;
  }
}

export const toErrorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));
