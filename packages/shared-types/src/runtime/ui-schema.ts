export type RuntimeComponentType = "separator" | "folder-select" | "key-value-list" | "dataset-select" | "text-input";

export interface RuntimeFieldSchema {
  id: string;
  componentType: RuntimeComponentType;
  props: Record<string, unknown>;
  rules: Array<{ type: "required" }>;
  group?: string;
  defaultValue?: string;
}

export interface RuntimeFormSchema {
  formId: string;
  title: string;
  fields: RuntimeFieldSchema[];
}
