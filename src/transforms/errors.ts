import { ValidationError, type ValidationIssue } from "../config/validation.js";

/**
 * Raised by a helper factory when its configuration is invalid.
 */
export class TransformConfigError extends ValidationError {
  /** Factory that rejected its configuration (e.g. "renameKeys") */
  public readonly transform: string;

  constructor(transform: string, issues: ValidationIssue[]) {
    super(`Invalid ${transform} configuration`, issues);
    this.name = "TransformConfigError";
    this.transform = transform;
  }
}
