import type { WebappManifest } from "@paramform/shared-types";
import { imageLabelingManifest } from "./image-labeling";

export interface WebappEntry {
  id: string;
  manifest: WebappManifest;
}

export const builtinWebapps: WebappEntry[] = [{ id: "image-labeling", manifest: imageLabelingManifest }];

export { imageLabelingManifest };
