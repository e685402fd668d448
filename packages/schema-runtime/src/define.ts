import type {
  DatasetField,
  FolderField,
  KeyValueListField,
  SeparatorField,
  StringField,
  WebappManifest
} from "@paramform/shared-types";
import { checkManifest, hasErrors, ManifestValidationError } from "@paramform/validation-engine";

type FieldInput<T extends { type: string }> = Omit<T, "type">;

export function separator(name: string, label: string): SeparatorField {
  return { type: "SEPARATOR", name, label };
}

export function folder(input: FieldInput<FolderField>): FolderField {
  return { type: "FOLDER", ...input };
}

export function keyValueList(input: FieldInput<KeyValueListField>): KeyValueListField {
  return { type: "KEY_VALUE_LIST", ...input };
}

export function dataset(input: FieldInput<DatasetField>): DatasetField {
  return { type: "DATASET", ...input };
}

export function stringParam(input: FieldInput<StringField>): StringField {
  return { type: "STRING", ...input };
}

/**
 * Declares a manifest. Throws {@link ManifestValidationError} when the params
 * repeat a name or combine attributes that leave a field unusable.
 */
export function defineManifest(manifest: WebappManifest): WebappManifest {
  const issues = checkManifest(manifest);
  if (hasErrors(issues)) throw new ManifestValidationError(issues);
  return manifest;
}
