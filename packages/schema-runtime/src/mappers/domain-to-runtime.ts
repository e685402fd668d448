import type {
  FieldDescriptor,
  RuntimeComponentType,
  RuntimeFieldSchema,
  RuntimeFormSchema,
  ValueField,
  WebappManifest
} from "@paramform/shared-types";

const componentTypes: Record<FieldDescriptor["type"], RuntimeComponentType> = {
  SEPARATOR: "separator",
  FOLDER: "folder-select",
  KEY_VALUE_LIST: "key-value-list",
  DATASET: "dataset-select",
  STRING: "text-input"
};

function fieldProps(field: ValueField): Record<string, unknown> {
  const props: Record<string, unknown> = { label: field.label };
  if (field.description !== undefined) props.description = field.description;
  if (field.type === "FOLDER") props.canSelectForeign = field.canSelectForeign ?? false;
  if (field.type === "DATASET") {
    props.canSelectForeign = field.canSelectForeign ?? false;
    props.canCreateDataset = field.canCreateDataset ?? false;
  }
  return props;
}

export function manifestToRuntime(manifest: WebappManifest, formId: string): RuntimeFormSchema {
  let group: string | undefined;

  const fields = manifest.params.map((field): RuntimeFieldSchema => {
    if (field.type === "SEPARATOR") {
      group = field.label;
      return { id: field.name, componentType: componentTypes.SEPARATOR, props: { label: field.label }, rules: [] };
    }

    const base: RuntimeFieldSchema = {
      id: field.name,
      componentType: componentTypes[field.type],
      props: fieldProps(field),
      rules: field.mandatory ? [{ type: "required" }] : [],
      ...(group !== undefined ? { group } : {})
    };

    if (field.type !== "STRING" || field.defaultValue === undefined) return base;
    return { ...base, defaultValue: field.defaultValue };
  });

  return { formId, title: manifest.meta.label, fields };
}
