import type { ManifestIssue, WebappManifest } from "@paramform/shared-types";

/**
 * Structural checks a schema cannot express: name uniqueness across params and
 * attribute combinations that make a field unusable.
 */
export function checkManifest(manifest: WebappManifest): ManifestIssue[] {
  const issues: ManifestIssue[] = [];
  const firstIndex = new Map<string, number>();

  manifest.params.forEach((field, index) => {
    const previous = firstIndex.get(field.name);
    if (previous === undefined) {
      firstIndex.set(field.name, index);
    } else {
      issues.push({
        code: "duplicate-name",
        path: `params.${index}.name`,
        message: `Parameter name "${field.name}" is already used by params.${previous}`,
        severity: "error"
      });
    }

    // A created dataset belongs to the current project, never a foreign one.
    if (field.type === "DATASET" && field.canCreateDataset && field.canSelectForeign) {
      issues.push({
        code: "unreachable-dataset-creation",
        path: `params.${index}`,
        message: `Dataset "${field.name}" cannot both require foreign selection and allow creation`,
        severity: "error"
      });
    }

    if (field.type === "STRING" && field.mandatory && field.defaultValue?.trim() === "") {
      issues.push({
        code: "empty-default",
        path: `params.${index}.defaultValue`,
        message: `Mandatory string "${field.name}" has an empty default value`,
        severity: "warning"
      });
    }
  });

  return issues;
}

export function hasErrors(issues: ManifestIssue[]): boolean {
  return issues.some((issue) => issue.severity === "error");
}
