import type { WebappManifest } from "@paramform/shared-types";
import { ManifestValidationError, validateManifestDocument } from "@paramform/validation-engine";

export function parseManifest(raw: unknown): WebappManifest {
  const result = validateManifestDocument(raw);
  if (!result.ok) throw new ManifestValidationError(result.issues);
  return result.manifest;
}

export function parseManifestJson(text: string): WebappManifest {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new ManifestValidationError([
      {
        code: "invalid-json",
        path: "",
        message: e instanceof Error ? e.message : String(e),
        severity: "error"
      }
    ]);
  }
  return parseManifest(raw);
}
