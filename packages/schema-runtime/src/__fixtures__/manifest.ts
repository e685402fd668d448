import type { WebappManifest } from "@paramform/shared-types";
import { dataset, folder, keyValueList, separator, stringParam } from "../define";

export function groupedManifest(): WebappManifest {
  return {
    meta: { label: "Grouped", description: "Fields under separators", icon: "icon-list" },
    baseType: "STANDARD",
    enableJavascriptModules: true,
    hasBackend: true,
    standardWebAppLibraries: ["jquery", "bootstrap"],
    params: [
      stringParam({ name: "title", label: "Title", mandatory: false }),
      separator("s1", "Inputs"),
      folder({ name: "f", label: "Folder", description: "Images", mandatory: true }),
      separator("s2", "Outputs"),
      dataset({ name: "d", label: "Dataset", mandatory: false, canCreateDataset: true }),
      stringParam({ name: "col", label: "Column", mandatory: true, defaultValue: "label" }),
      keyValueList({ name: "cats", label: "Categories", mandatory: true })
    ]
  };
}
