import type { WebappManifest } from "@paramform/shared-types";
import { sampleManifest } from "./__fixtures__/manifest";
import {
  buildBindingsAjvValidator,
  buildBindingsJsonSchema,
  buildManifestAjvValidator
} from "./ajv-builder";

describe("buildManifestAjvValidator", () => {
  const validate = buildManifestAjvValidator();

  it("accepts a well-formed manifest", () => {
    expect(validate(sampleManifest())).toBe(true);
  });

  it("rejects an unknown field type", () => {
    const raw: unknown = { ...sampleManifest(), params: [{ type: "NUMBER", name: "n", label: "N" }] };
    expect(validate(raw)).toBe(false);
  });

  it("rejects attributes that belong to another field type", () => {
    const raw: unknown = {
      ...sampleManifest(),
      params: [{ type: "FOLDER", name: "f", label: "F", mandatory: true, defaultValue: "x" }]
    };
    expect(validate(raw)).toBe(false);
  });

  it("requires mandatory on value fields", () => {
    const raw: unknown = { ...sampleManifest(), params: [{ type: "DATASET", name: "d", label: "D" }] };
    expect(validate(raw)).toBe(false);
  });
});

describe("buildBindingsJsonSchema", () => {
  it("describes one property per value field", () => {
    expect(buildBindingsJsonSchema(sampleManifest())).toEqual({
      type: "object",
      properties: {
        input_folder: { title: "Input folder", type: "string", pattern: "\\S" },
        tags: {
          title: "Tags",
          description: "Tag → value",
          type: "object",
          additionalProperties: { type: ["string", "null"] }
        },
        output_ds: { title: "Output dataset", type: "string", pattern: "\\S" },
        column: { title: "Column", type: "string", pattern: "\\S", default: "value" },
        note: { title: "Note", type: "string" }
      },
      required: ["input_folder", "output_ds"],
      additionalProperties: false
    });
  });

  it("compiles into a validator with the same contract", () => {
    const validate = buildBindingsAjvValidator(sampleManifest());

    expect(validate({ input_folder: "F1", output_ds: "out", tags: { a: null } })).toBe(true);
    expect(validate({ input_folder: "  ", output_ds: "out" })).toBe(false);
    expect(validate({ output_ds: "out" })).toBe(false);
    expect(validate({ input_folder: "F1", output_ds: "out", sep_source: "x" })).toBe(false);
  });

  it("fills in string defaults", () => {
    const validate = buildBindingsAjvValidator(sampleManifest());
    const input: Record<string, unknown> = { input_folder: "F1", output_ds: "out" };

    expect(validate(input)).toBe(true);
    expect(input).toEqual({ input_folder: "F1", output_ds: "out", column: "value" });
  });

  it("requires at least one entry in a mandatory key-value list", () => {
    const manifest: WebappManifest = {
      ...sampleManifest(),
      params: [{ type: "KEY_VALUE_LIST", name: "tags", label: "Tags", mandatory: true }]
    };
    const validate = buildBindingsAjvValidator(manifest);

    expect(validate({ tags: {} })).toBe(false);
    expect(validate({ tags: { cat: null } })).toBe(true);
  });
});
