export type FieldType = "SEPARATOR" | "FOLDER" | "KEY_VALUE_LIST" | "DATASET" | "STRING";

interface FieldBase<T extends FieldType> {
  type: T;
  /** Key of the value in the bindings handed to the webapp. Unique within a manifest. */
  name: string;
  label: string;
}

interface ValueFieldBase<T extends FieldType> extends FieldBase<T> {
  mandatory: boolean;
  description?: string;
}

/** Visual grouping marker. Has no value slot. */
export type SeparatorField = FieldBase<"SEPARATOR">;

export interface FolderField extends ValueFieldBase<"FOLDER"> {
  canSelectForeign?: boolean;
}

/** String key to optional string value. */
export type KeyValueListField = ValueFieldBase<"KEY_VALUE_LIST">;

export interface DatasetField extends ValueFieldBase<"DATASET"> {
  canSelectForeign?: boolean;
  canCreateDataset?: boolean;
}

export interface StringField extends ValueFieldBase<"STRING"> {
  defaultValue?: string;
}

export type FieldDescriptor = SeparatorField | FolderField | KeyValueListField | DatasetField | StringField;

export type ValueField = Exclude<FieldDescriptor, SeparatorField>;

export interface ManifestMeta {
  label: string;
  description: string;
  icon: string;
}

export interface WebappManifest {
  meta: ManifestMeta;
  baseType: string;
  enableJavascriptModules: boolean;
  hasBackend: boolean;
  standardWebAppLibraries: string[];
  /** Rendering order. */
  params: FieldDescriptor[];
}

export type KeyValueList = Record<string, string | null>;

export type BindingValue = string | KeyValueList;

export type WebappBindings = Record<string, BindingValue>;

export function isValueField(field: FieldDescriptor): field is ValueField {
  return field.type !== "SEPARATOR";
}
