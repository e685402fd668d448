import type { FieldDescriptor, WebappManifest } from "@paramform/shared-types";

function serializeField(field: FieldDescriptor): FieldDescriptor {
  if (field.type === "SEPARATOR") return { type: field.type, name: field.name, label: field.label };

  const base = {
    name: field.name,
    label: field.label,
    ...(field.description !== undefined ? { description: field.description } : {}),
    mandatory: field.mandatory
  };

  switch (field.type) {
    case "FOLDER":
      return {
        type: field.type,
        ...base,
        ...(field.canSelectForeign !== undefined ? { canSelectForeign: field.canSelectForeign } : {})
      };
    case "KEY_VALUE_LIST":
      return { type: field.type, ...base };
    case "DATASET":
      return {
        type: field.type,
        ...base,
        ...(field.canSelectForeign !== undefined ? { canSelectForeign: field.canSelectForeign } : {}),
        ...(field.canCreateDataset !== undefined ? { canCreateDataset: field.canCreateDataset } : {})
      };
    case "STRING":
      return {
        type: field.type,
        ...base,
        ...(field.defaultValue !== undefined ? { defaultValue: field.defaultValue } : {})
      };
  }
}

/** Plain JSON document in canonical key order, detached from the input. */
export function serializeManifest(manifest: WebappManifest): WebappManifest {
  return {
    meta: {
      label: manifest.meta.label,
      description: manifest.meta.description,
      icon: manifest.meta.icon
    },
    baseType: manifest.baseType,
    enableJavascriptModules: manifest.enableJavascriptModules,
    hasBackend: manifest.hasBackend,
    standardWebAppLibraries: [...manifest.standardWebAppLibraries],
    params: manifest.params.map(serializeField)
  };
}

export function stringifyManifest(manifest: WebappManifest, indent = 4): string {
  return JSON.stringify(serializeManifest(manifest), null, indent);
}
