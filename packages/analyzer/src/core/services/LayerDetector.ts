/**
 * Layer Detector - recognise conventional architecture directories at the root.
 */

import path from "node:path";

import type { LayerMap } from "../model.js";
import type { FileSystem } from "../ports/FileSystem.js";

/** Directory name to layer name, in reporting order */
export const LAYER_DIRECTORIES: ReadonlyArray<readonly [string, string]> = [
  ["controllers", "Controller Layer"],
  ["models", "Model Layer"],
  ["views", "View Layer"],
  ["services", "Service Layer"],
  ["repositories", "Data Access Layer"],
  ["api", "API Layer"],
  ["domain", "Domain Layer"],
  ["infrastructure", "Infrastructure Layer"],
  ["presentation", "Presentation Layer"],
  ["middleware", "Middleware"],
  ["utils", "Utilities"],
  ["helpers", "Helpers"],
];

/** Top-down order used to connect layers in the architecture diagram */
export const LAYER_ORDER: readonly string[] = [
  "Presentation Layer",
  "API Layer",
  "Controller Layer",
  "Service Layer",
  "Domain Layer",
  "Data Access Layer",
  "Infrastructure Layer",
];

export function detectLayers(rootPath: string, fs: FileSystem): LayerMap {
  const layers: LayerMap = {};

  for (const [directory, layer] of LAYER_DIRECTORIES) {
    if (fs.isDirectory(path.join(rootPath, directory))) {
      layers[layer] = [...(layers[layer] ?? []), directory];
    }
  }

  return layers;
}
