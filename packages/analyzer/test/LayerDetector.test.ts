import { describe, it, expect } from "vitest";

import { detectLayers } from "../src/core/services/LayerDetector.js";
import { MemoryFileSystem } from "./helpers.js";

describe("detectLayers", () => {
  it("maps conventional directories at the root to layers", () => {
    const fs = new MemoryFileSystem({ "/proj/models": "not a directory" }, [
      "/proj/services",
      "/proj/controllers",
      "/proj/utils",
      "/proj/src/domain",
    ]);

    expect(detectLayers("/proj", fs)).toEqual({
      "Controller Layer": ["controllers"],
      "Service Layer": ["services"],
      Utilities: ["utils"],
    });
  });

  it("returns no layers for a flat tree", () => {
    expect(detectLayers("/proj", new MemoryFileSystem({}, ["/proj"]))).toEqual({});
  });
});
