import type { BlockingIssue, WarningIssue } from "./types/index.js";

export class NotFoundError extends Error {
  constructor(message = "Resource not found.") {
    super(message);
    this.name = "NotFoundError";
  }
}

/** An expense that cannot be saved; carries every blocking issue found */
export class ExpenseValidationError extends Error {
  readonly issues: BlockingIssue[];
  readonly warnings: WarningIssue[];

  constructor(issues: BlockingIssue[], warnings: WarningIssue[] = []) {
    super(issues.map((issue) => issue.message).join("; ") || "Expense is invalid.");
    this.name = "ExpenseValidationError";
    this.issues = issues;
    this.warnings = warnings;
  }
}

// Balances did not sum to zero: an internal fault, never user input
export class SettlementComputationError extends Error {
  readonly issue: BlockingIssue;

  constructor(issue: BlockingIssue) {
    super(issue.message);
    this.name = "SettlementComputationError";
    this.issue = issue;
  }
}

export class RequestValidationError extends Error {
  readonly details: string[];

  constructor(details: string[]) {
    super(details.join("; ") || "Invalid request.");
    this.name = "RequestValidationError";
    this.details = details;
  }
}
