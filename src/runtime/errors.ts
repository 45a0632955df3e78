/** Workflow-level errors. Each carries a machine-readable `code`. */

/** The oracle produced something that is not a usable decision */
export class OraclePathError extends Error {
  readonly code = "oracle_path";
  readonly raw: string;

  constructor(message: string, raw = "") {
    super(message);
    this.name = "OraclePathError";
    this.raw = raw;
  }
}

/** An executor's required input is absent; nothing was written */
export class PreconditionError extends Error {
  readonly code = "precondition_failed";
  readonly action: string;

  constructor(action: string, message: string) {
    super(`${action}: ${message}`);
    this.name = "PreconditionError";
    this.action = action;
  }
}

/** The summarizer returned no usable JSON */
export class SummaryParseError extends Error {
  readonly code = "summary_parse";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SummaryParseError";
  }
}

/** Step ceiling, repeat policy or consecutive-error ceiling reached */
export class LoopGuardTripped extends Error {
  readonly code = "loop_guard";
  readonly reason: string;

  constructor(reason: string) {
    super(`Loop guard tripped: ${reason}`);
    this.name = "LoopGuardTripped";
    this.reason = reason;
  }
}

export class CaseNotFoundError extends Error {
  readonly code = "case_not_found";
  readonly caseId: string;

  constructor(caseId: string) {
    super(`Case "${caseId}" not found`);
    this.name = "CaseNotFoundError";
    this.caseId = caseId;
  }
}

export class DuplicateCaseError extends Error {
  readonly code = "duplicate_case";
  readonly caseId: string;

  constructor(caseId: string) {
    super(`Case "${caseId}" already exists`);
    this.name = "DuplicateCaseError";
    this.caseId = caseId;
  }
}

/** Machine-readable code of any error, for tool responses */
export function errorCode(err: unknown): string {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return "internal_error";
}
