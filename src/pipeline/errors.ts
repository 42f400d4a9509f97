import { ValidationError, type ValidationIssue } from "../config/validation.js";

/**
 * Raised at construction when pipeline options are invalid.
 * Errors raised while a pipeline runs are never wrapped.
 */
export class PipelineConfigError extends ValidationError {
  constructor(issues: ValidationIssue[]) {
    super("Invalid pipeline options", issues);
    this.name = "PipelineConfigError";
  }
}
