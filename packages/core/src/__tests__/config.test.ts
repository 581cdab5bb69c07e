import { describe, it, expect } from "vitest";
import { mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { parseSettings, applyOverrides, loadSettings } from "../config.js";

describe("parseSettings", () => {
  it("returns defaults for an empty document", () => {
    expect(parseSettings(null).model.tier).toBe("sonnet");
  });

  it("lists every invalid field in the error", () => {
    expect(() =>
      parseSettings({ model: { temperature: 3 }, history: { maxEntries: 0 } })
    ).toThrow(/model\.temperature[\s\S]*history\.maxEntries/);
  });
});

describe("applyOverrides", () => {
  const base = parseSettings({});

  it("applies numeric overrides", () => {
    const settings = applyOverrides(base, { temperature: "0.2", maxTokens: "512" });
    expect(settings.model.temperature).toBe(0.2);
    expect(settings.model.maxTokens).toBe(512);
  });

  it("ignores values that do not parse", () => {
    const settings = applyOverrides(base, { temperature: "warm", maxTokens: "-4" });
    expect(settings.model.temperature).toBe(0.7);
    expect(settings.model.maxTokens).toBe(1000);
  });

  it("does not mutate the input settings", () => {
    applyOverrides(base, { temperature: "0.1" });
    expect(base.model.temperature).toBe(0.7);
  });
});

describe("loadSettings", () => {
  it("uses defaults when the file is missing", async () => {
    const dir = await mkdtemp(join(tmpdir(), "postcraft-config-"));
    const settings = await loadSettings(join(dir, "missing.yml"));
    expect(settings.paths.dataDir).toBe("data");
  });

  it("reads YAML settings", async () => {
    const dir = await mkdtemp(join(tmpdir(), "postcraft-config-"));
    const path = join(dir, "postcraft.yml");
    await writeFile(path, "model:\n  tier: opus\ngeneration:\n  maxExamples: 1\n");
    const settings = await loadSettings(path);
    expect(settings.model.tier).toBe("opus");
    expect(settings.generation.maxExamples).toBe(1);
  });
});
