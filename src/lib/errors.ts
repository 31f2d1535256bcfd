export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class ReportShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ReportShapeError";
  }
}

export class AllCandidatesFailedError extends Error {
  readonly errors: unknown[];
  readonly lastError: unknown;

  constructor(errors: unknown[]) {
    const last = errors[errors.length - 1];
    super(`All ${errors.length} candidates failed; last error: ${describeError(last)}`);
    this.name = "AllCandidatesFailedError";
    this.errors = errors;
    this.lastError = last;
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message ? `${err.name}: ${err.message}` : err.name;
  }
  if (!err || typeof err !== "object") return String(err);
  const status = "status" in err && typeof err.status === "number" ? `status ${err.status}` : "";
  const message = "message" in err && typeof err.message === "string" ? err.message : "";
  return [status, message].filter(Boolean).join(" ").trim() || "unknown error";
}
