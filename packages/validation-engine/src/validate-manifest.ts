import type { ZodIssue } from "zod";
import type { ManifestIssue, WebappManifest } from "@paramform/shared-types";
import { checkManifest, hasErrors } from "./checks";
import { manifestDocumentSchema } from "./zod-builder";

export type ManifestValidationResult =
  | { ok: true; manifest: WebappManifest; warnings: ManifestIssue[] }
  | { ok: false; issues: ManifestIssue[] };

function toDocumentIssue(issue: ZodIssue): ManifestIssue {
  return {
    code: "invalid-document",
    path: issue.path.join("."),
    message: issue.message,
    severity: "error"
  };
}

export function validateManifestDocument(raw: unknown): ManifestValidationResult {
  const parsed = manifestDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, issues: parsed.error.issues.map(toDocumentIssue) };
  }

  const issues = checkManifest(parsed.data);
  if (hasErrors(issues)) return { ok: false, issues };
  return { ok: true, manifest: parsed.data, warnings: issues };
}
