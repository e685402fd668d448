import type { ManifestIssue } from "@paramform/shared-types";

export function formatIssue(issue: ManifestIssue): string {
  return issue.path ? `${issue.path}: ${issue.message}` : issue.message;
}

export class ManifestValidationError extends Error {
  readonly issues: ManifestIssue[];

  constructor(issues: ManifestIssue[]) {
    const errors = issues.filter((issue) => issue.severity === "error");
    super(`Invalid manifest: ${errors.map(formatIssue).join("; ")}`);
    this.name = "ManifestValidationError";
    this.issues = issues;
  }
}
