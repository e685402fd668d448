import { z, type ZodTypeAny } from "zod";
import { isValueField, type ValueField, type WebappManifest } from "@paramform/shared-types";

const name = z.string().min(1);
const label = z.string();
const description = z.string().optional();

const separatorSchema = z.object({ type: z.literal("SEPARATOR"), name, label }).strict();

const folderSchema = z
  .object({
    type: z.literal("FOLDER"),
    name,
    label,
    description,
    mandatory: z.boolean(),
    canSelectForeign: z.boolean().optional()
  })
  .strict();

const keyValueListSchema = z
  .object({
    type: z.literal("KEY_VALUE_LIST"),
    name,
    label,
    description,
    mandatory: z.boolean()
  })
  .strict();

const datasetSchema = z
  .object({
    type: z.literal("DATASET"),
    name,
    label,
    description,
    mandatory: z.boolean(),
    canSelectForeign: z.boolean().optional(),
    canCreateDataset: z.boolean().optional()
  })
  .strict();

const stringSchema = z
  .object({
    type: z.literal("STRING"),
    name,
    label,
    description,
    mandatory: z.boolean(),
    defaultValue: z.string().optional()
  })
  .strict();

export const fieldDescriptorSchema = z.discriminatedUnion("type", [
  separatorSchema,
  folderSchema,
  keyValueListSchema,
  datasetSchema,
  stringSchema
]);

export const manifestDocumentSchema: z.ZodType<WebappManifest> = z
  .object({
    meta: z.object({ label: z.string().min(1), description: z.string(), icon: z.string() }).strict(),
    baseType: z.string().min(1),
    enableJavascriptModules: z.boolean(),
    hasBackend: z.boolean(),
    standardWebAppLibraries: z.array(z.string()),
    params: z.array(fieldDescriptorSchema)
  })
  .strict();

function notBlank(value: string): boolean {
  return value.trim().length > 0;
}

function buildField(field: ValueField): ZodTypeAny {
  const required_error = `${field.label} is required`;

  if (field.type === "KEY_VALUE_LIST") {
    const list = z.record(z.string(), z.string().nullable(), { required_error });
    if (!field.mandatory) return list.optional();
    return list.refine((value) => Object.keys(value).length > 0, {
      message: `${field.label} must have at least one entry`
    });
  }

  const text: ZodTypeAny = field.mandatory
    ? z.string({ required_error }).refine(notBlank, { message: `${field.label} must not be empty` })
    : z.string();

  if (field.type === "STRING" && field.defaultValue !== undefined) return text.default(field.defaultValue);
  return field.mandatory ? text : text.optional();
}

/**
 * Schema of the bindings a host passes to the webapp once the form is filled in.
 * Separators have no slot, so a key named after one is rejected like any other unknown key.
 */
export function buildBindingsSchema(manifest: WebappManifest) {
  const shape: Record<string, ZodTypeAny> = {};
  for (const field of manifest.params) {
    if (!isValueField(field)) continue;
    shape[field.name] = buildField(field);
  }
  return z.object(shape).strict();
}
