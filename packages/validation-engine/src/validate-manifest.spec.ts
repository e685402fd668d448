import { sampleManifest } from "./__fixtures__/manifest";
import { validateManifestDocument } from "./validate-manifest";

describe("validateManifestDocument", () => {
  it("returns the typed manifest", () => {
    expect(validateManifestDocument(sampleManifest())).toEqual({ ok: true, manifest: sampleManifest(), warnings: [] });
  });

  it("converts schema failures into document issues", () => {
    const raw: unknown = { ...sampleManifest(), params: [{ type: "FOLDER", name: "f", label: "F" }] };

    expect(validateManifestDocument(raw)).toEqual({
      ok: false,
      issues: [{ code: "invalid-document", path: "params.0.mandatory", message: "Required", severity: "error" }]
    });
  });

  it("reports a non-object document at the root", () => {
    expect(validateManifestDocument("nope")).toEqual({
      ok: false,
      issues: [{ code: "invalid-document", path: "", message: "Expected object, received string", severity: "error" }]
    });
  });

  it("fails on structural errors", () => {
    const manifest = sampleManifest();
    manifest.params.push({ type: "FOLDER", name: "input_folder", label: "Again", mandatory: false });

    const result = validateManifestDocument(manifest);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.issues.map((issue) => issue.code)).toEqual(["duplicate-name"]);
  });

  it("passes warnings through without failing", () => {
    const manifest = sampleManifest();
    manifest.params[4] = { type: "STRING", name: "column", label: "Column", mandatory: true, defaultValue: " " };

    const result = validateManifestDocument(manifest);
    expect(result.ok).toBe(true);
    if (result.ok) expect(result.warnings.map((issue) => issue.code)).toEqual(["empty-default"]);
  });
});
