import type { WebappManifest } from "@paramform/shared-types";

export function sampleManifest(): WebappManifest {
  return {
    meta: { label: "Sample", description: "Sample webapp", icon: "icon-star" },
    baseType: "STANDARD",
    enableJavascriptModules: true,
    hasBackend: false,
    standardWebAppLibraries: ["jquery"],
    params: [
      { type: "SEPARATOR", name: "sep_source", label: "Source" },
      { type: "FOLDER", name: "input_folder", label: "Input folder", mandatory: true },
      { type: "KEY_VALUE_LIST", name: "tags", label: "Tags", description: "Tag → value", mandatory: false },
      { type: "DATASET", name: "output_ds", label: "Output dataset", mandatory: true, canCreateDataset: true },
      { type: "STRING", name: "column", label: "Column", mandatory: true, defaultValue: "value" },
      { type: "STRING", name: "note", label: "Note", mandatory: false }
    ]
  };
}
