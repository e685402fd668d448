import { folder, separator } from "../define";
import { groupedManifest } from "../__fixtures__/manifest";
import { serializeManifest, stringifyManifest } from "./domain-to-raw";

describe("serializeManifest", () => {
  it("writes field attributes in canonical order and drops absent ones", () => {
    const manifest = groupedManifest();
    manifest.params = [
      folder({ canSelectForeign: true, mandatory: true, description: "Images", label: "Folder", name: "f" }),
      folder({ mandatory: false, label: "Other", name: "g" })
    ];

    const [first, second] = serializeManifest(manifest).params;
    expect(Object.keys(first ?? {})).toEqual(["type", "name", "label", "description", "mandatory", "canSelectForeign"]);
    expect(Object.keys(second ?? {})).toEqual(["type", "name", "label", "mandatory"]);
  });

  it("writes the manifest keys in canonical order", () => {
    expect(Object.keys(serializeManifest(groupedManifest()))).toEqual([
      "meta",
      "baseType",
      "enableJavascriptModules",
      "hasBackend",
      "standardWebAppLibraries",
      "params"
    ]);
  });

  it("keeps separators free of value attributes", () => {
    const manifest = groupedManifest();
    manifest.params = [separator("s", "Section")];
    expect(serializeManifest(manifest).params).toEqual([{ type: "SEPARATOR", name: "s", label: "Section" }]);
  });

  it("detaches the document from the manifest", () => {
    const manifest = groupedManifest();
    const document = serializeManifest(manifest);
    document.standardWebAppLibraries.push("d3");
    document.meta.label = "Changed";

    expect(manifest.standardWebAppLibraries).toEqual(["jquery", "bootstrap"]);
    expect(manifest.meta.label).toBe("Grouped");
  });
});

describe("stringifyManifest", () => {
  it("indents with four spaces by default", () => {
    expect(stringifyManifest(groupedManifest()).startsWith('{\n    "meta": {\n        "label": "Grouped",')).toBe(true);
  });

  it("takes a custom indent", () => {
    expect(stringifyManifest(groupedManifest(), 0).startsWith('{"meta":{"label":"Grouped",')).toBe(true);
  });
});
