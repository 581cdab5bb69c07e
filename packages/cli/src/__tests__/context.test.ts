import { describe, it, expect } from "vitest";
import { parseSettings } from "@postcraft/core";
import { resolveDatasetPath, splitList } from "../context.js";

const settings = parseSettings({ paths: { dataDir: "posts", defaultDataset: "posts/main.json" } });

describe("resolveDatasetPath", () => {
  it("falls back to the default dataset", () => {
    expect(resolveDatasetPath(undefined, settings)).toBe("posts/main.json");
  });

  it("looks up bare names in the data directory", () => {
    expect(resolveDatasetPath("interns", settings)).toBe("posts/interns.json");
  });

  it("uses paths as given", () => {
    expect(resolveDatasetPath("other/set.json", settings)).toBe("other/set.json");
    expect(resolveDatasetPath("local.json", settings)).toBe("local.json");
  });
});

describe("splitList", () => {
  it("splits and trims comma-separated values", () => {
    expect(splitList(" growth, ,mentorship ")).toEqual(["growth", "mentorship"]);
    expect(splitList(undefined)).toEqual([]);
  });
});
