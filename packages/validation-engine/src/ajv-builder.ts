import Ajv, { type SchemaObject } from "ajv";
import { isValueField, type FieldType, type ValueField, type WebappManifest } from "@paramform/shared-types";

function fieldVariant(type: FieldType, extra: Record<string, SchemaObject>, required: string[] = []): SchemaObject {
  return {
    type: "object",
    properties: {
      type: { const: type },
      name: { type: "string", minLength: 1 },
      label: { type: "string" },
      ...extra
    },
    required: ["type", "name", "label", ...required],
    additionalProperties: false
  };
}

/** Draft-07 schema of a manifest document, for validators that do not run the zod schema. */
export function buildManifestJsonSchema(): SchemaObject {
  const description = { type: "string" };
  const flag = { type: "boolean" };

  return {
    $schema: "http://json-schema.org/draft-07/schema#",
    type: "object",
    properties: {
      meta: {
        type: "object",
        properties: {
          label: { type: "string", minLength: 1 },
          description: { type: "string" },
          icon: { type: "string" }
        },
        required: ["label", "description", "icon"],
        additionalProperties: false
      },
      baseType: { type: "string", minLength: 1 },
      enableJavascriptModules: flag,
      hasBackend: flag,
      standardWebAppLibraries: { type: "array", items: { type: "string" } },
      params: {
        type: "array",
        items: {
          oneOf: [
            fieldVariant("SEPARATOR", {}),
            fieldVariant("FOLDER", { description, mandatory: flag, canSelectForeign: flag }, ["mandatory"]),
            fieldVariant("KEY_VALUE_LIST", { description, mandatory: flag }, ["mandatory"]),
            fieldVariant(
              "DATASET",
              { description, mandatory: flag, canSelectForeign: flag, canCreateDataset: flag },
              ["mandatory"]
            ),
            fieldVariant("STRING", { description, mandatory: flag, defaultValue: { type: "string" } }, ["mandatory"])
          ]
        }
      }
    },
    required: ["meta", "baseType", "enableJavascriptModules", "hasBackend", "standardWebAppLibraries", "params"],
    additionalProperties: false
  };
}

export function buildManifestAjvValidator() {
  const ajv = new Ajv({ allErrors: true });
  return ajv.compile(buildManifestJsonSchema());
}

function bindingProperty(field: ValueField): SchemaObject {
  const prop: SchemaObject = { title: field.label };
  if (field.description) prop.description = field.description;

  if (field.type === "KEY_VALUE_LIST") {
    prop.type = "object";
    prop.additionalProperties = { type: ["string", "null"] };
    if (field.mandatory) prop.minProperties = 1;
    return prop;
  }

  prop.type = "string";
  if (field.mandatory) prop.pattern = "\\S";
  if (field.type === "STRING" && field.defaultValue !== undefined) prop.default = field.defaultValue;
  return prop;
}

export function buildBindingsJsonSchema(manifest: WebappManifest): SchemaObject {
  const properties: Record<string, SchemaObject> = {};
  const required: string[] = [];

  for (const field of manifest.params) {
    if (!isValueField(field)) continue;
    properties[field.name] = bindingProperty(field);
    const hasDefault = field.type === "STRING" && field.defaultValue !== undefined;
    if (field.mandatory && !hasDefault) required.push(field.name);
  }

  return {
    type: "object",
    properties,
    required,
    additionalProperties: false
  };
}

export function buildBindingsAjvValidator(manifest: WebappManifest) {
  const ajv = new Ajv({ allErrors: true, allowUnionTypes: true, useDefaults: true });
  return ajv.compile(buildBindingsJsonSchema(manifest));
}
