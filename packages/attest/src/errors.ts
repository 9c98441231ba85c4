import { WatersealError } from "../../verdict/src/index.js";

export type { WatersealErrorCode, DecisionIssue, DecisionIssueCode } from "../../verdict/src/index.js";
export { WatersealError, InvalidDecisionError, UnknownSchemeError } from "../../verdict/src/index.js";

/**
 * Signing capability not ready: before init, after destroy, or a key source
 * that did not answer in time.
 */
export class KeyUnavailableError extends WatersealError {
  constructor(message: string) {
    super("KEY_UNAVAILABLE", message);
  }
}

export class ConfigError extends WatersealError {
  readonly variables: string[];

  constructor(variables: string[], message: string) {
    super("CONFIG", message);
    this.variables = variables;
  }
}
