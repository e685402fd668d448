import type { FieldType, WebappManifest } from "@paramform/shared-types";

export interface ManifestSummary {
  /** Names of every field that carries a value, in declaration order. */
  valueFields: string[];
  mandatory: string[];
  optional: string[];
  separators: string[];
  countsByType: Record<FieldType, number>;
}

export function summarizeManifest(manifest: WebappManifest): ManifestSummary {
  const countsByType: Record<FieldType, number> = { SEPARATOR: 0, FOLDER: 0, KEY_VALUE_LIST: 0, DATASET: 0, STRING: 0 };
  const summary: ManifestSummary = { valueFields: [], mandatory: [], optional: [], separators: [], countsByType };

  for (const field of manifest.params) {
    countsByType[field.type] += 1;
    if (field.type === "SEPARATOR") {
      summary.separators.push(field.name);
      continue;
    }
    summary.valueFields.push(field.name);
    (field.mandatory ? summary.mandatory : summary.optional).push(field.name);
  }

  return summary;
}
