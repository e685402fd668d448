export type IssueSeverity = "error" | "warning";

export type IssueCode =
  | "invalid-json"
  | "invalid-document"
  | "duplicate-name"
  | "unreachable-dataset-creation"
  | "empty-default"
  | "invalid-binding";

export interface ManifestIssue {
  code: IssueCode;
  /** Dotted path into the document, e.g. `params.3.name`. Empty for the root. */
  path: string;
  message: string;
  severity: IssueSeverity;
}
