import {
  dataset,
  defineManifest,
  folder,
  keyValueList,
  separator,
  stringParam
} from "@paramform/schema-runtime";

export const imageLabelingManifest = defineManifest({
  meta: {
    label: "Image labeling",
    description: "Label images from a managed folder, optionally guided by active learning queries",
    icon: "icon-picture"
  },
  baseType: "STANDARD",
  enableJavascriptModules: true,
  hasBackend: true,
  standardWebAppLibraries: ["jquery", "bootstrap"],
  params: [
    separator("sep_input", "Input data"),
    folder({
      name: "folder",
      label: "Images to label",
      description: "Folder containing the images",
      mandatory: true,
      canSelectForeign: true
    }),
    keyValueList({
      name: "categories",
      label: "Categories",
      description: "Category name → optional description",
      mandatory: true
    }),
    separator("sep_output", "Output"),
    dataset({
      name: "metadata_ds",
      label: "Labeling status and metadata",
      description: "Dataset to save the labels and their metadata into",
      mandatory: true,
      canCreateDataset: true
    }),
    dataset({
      name: "labels_ds",
      label: "Labels dataset",
      description: "Dataset holding only the labeled images",
      mandatory: false,
      canCreateDataset: true
    }),
    stringParam({
      name: "label_col_name",
      label: "Labels column name",
      mandatory: true,
      defaultValue: "label"
    }),
    stringParam({
      name: "comment_col_name",
      label: "Comments column name",
      mandatory: false,
      defaultValue: "comment"
    }),
    separator("sep_active_learning", "Active learning"),
    dataset({
      name: "queries_ds",
      label: "Queries",
      description: "Dataset containing the queries (optional)",
      mandatory: false,
      canSelectForeign: true
    })
  ]
});
