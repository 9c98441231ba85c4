export type WatersealErrorCode =
  | "INVALID_DECISION"
  | "UNKNOWN_SCHEME"
  | "KEY_UNAVAILABLE"
  | "CONFIG";

export type DecisionIssueCode = "SCHEMA" | "REMEDIATION_REQUIRED" | "RISKS_REQUIRED";

export type DecisionIssue = {
  code: DecisionIssueCode;
  message: string;
  path: string; // JSON pointer-like path for debugging
};

export class WatersealError extends Error {
  readonly code: WatersealErrorCode;

  constructor(code: WatersealErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Decision failed structural, range or policy validation; it is never signed. */
export class InvalidDecisionError extends WatersealError {
  readonly issues: DecisionIssue[];

  constructor(issues: DecisionIssue[]) {
    const first = issues[0];
    super(
      "INVALID_DECISION",
      first
        ? `Invalid decision: ${first.path || "/"}: ${first.message}` +
            (issues.length > 1 ? ` (+${issues.length - 1} more)` : "")
        : "Invalid decision"
    );
    this.issues = issues;
  }
}

export class UnknownSchemeError extends WatersealError {
  readonly scheme_id: string;

  constructor(scheme_id: string) {
    super("UNKNOWN_SCHEME", `Unknown canonicalization scheme: ${scheme_id}`);
    this.scheme_id = scheme_id;
  }
}
