import type { ZodIssue } from "zod";
import type { ManifestIssue, WebappBindings, WebappManifest } from "@paramform/shared-types";
import { buildBindingsSchema } from "./zod-builder";

export type BindingsValidationResult = { ok: true; bindings: WebappBindings } | { ok: false; issues: ManifestIssue[] };

function toBindingIssues(issue: ZodIssue): ManifestIssue[] {
  if (issue.code === "unrecognized_keys") {
    return issue.keys.map((key): ManifestIssue => ({
      code: "invalid-binding",
      path: key,
      message: `${key} is not a parameter of this webapp`,
      severity: "error"
    }));
  }
  return [{ code: "invalid-binding", path: issue.path.join("."), message: issue.message, severity: "error" }];
}

/** Checks form values against the manifest and fills in string defaults. */
export function validateBindings(manifest: WebappManifest, input: unknown): BindingsValidationResult {
  const parsed = buildBindingsSchema(manifest).safeParse(input);
  if (!parsed.success) {
    return { ok: false, issues: parsed.error.issues.flatMap(toBindingIssues) };
  }
  return { ok: true, bindings: parsed.data };
}
