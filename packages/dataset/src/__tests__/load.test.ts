import { describe, it, expect } from "vitest";
import { mkdtemp, writeFile, readFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { parseDataset, loadDataset, createSnapshot } from "../load.js";
import { saveDataset, metadataPath } from "../save.js";
import { categorizeLength, countContentLines, ensureTags } from "../normalize.js";

describe("categorizeLength", () => {
  it("buckets by line count", () => {
    expect(categorizeLength(1)).toBe("Short");
    expect(categorizeLength(5)).toBe("Short");
    expect(categorizeLength(6)).toBe("Medium");
    expect(categorizeLength(10)).toBe("Medium");
    expect(categorizeLength(11)).toBe("Long");
  });
});

describe("countContentLines", () => {
  it("ignores blank spacer lines", () => {
    expect(countContentLines("One\n\nTwo\n   \nThree")).toBe(3);
  });
});

describe("ensureTags", () => {
  it("wraps a bare string", () => {
    expect(ensureTags("Internship")).toEqual(["Internship"]);
  });

  it("drops blanks, non-strings and case-insensitive duplicates", () => {
    expect(ensureTags([" Career ", "career", "", 3, "Growth"])).toEqual(["Career", "Growth"]);
  });

  it("returns empty list for missing tags", () => {
    expect(ensureTags(undefined)).toEqual([]);
  });
});

describe("parseDataset", () => {
  it("normalises snake_case records and fills derived fields", () => {
    const snapshot = parseDataset(
      [
        {
          text: "Line one\nLine two",
          tags: "Internship",
          language: "Hinglish",
          target_audience: "Students",
        },
      ],
      "sample"
    );

    expect(snapshot.name).toBe("sample");
    expect(snapshot.posts[0]).toEqual({
      text: "Line one\nLine two",
      tags: ["Internship"],
      language: "Hinglish",
      length: "Short",
      lineCount: 2,
      engagement: 0,
      targetAudience: "Students",
    });
  });

  it("accepts length_bucket and line_count aliases", () => {
    const snapshot = parseDataset([
      { text: "Hi", tags: ["x"], language: "English", length_bucket: "Long", line_count: 14, engagement: 7 },
    ]);
    expect(snapshot.posts[0]?.length).toBe("Long");
    expect(snapshot.posts[0]?.lineCount).toBe(14);
  });

  it("collects sorted unique tags", () => {
    const snapshot = parseDataset([
      { text: "a", tags: ["Jobs", "AI"] },
      { text: "b", tags: ["ai", "Career"] },
    ]);
    expect(snapshot.tags).toEqual(["AI", "Career", "Jobs"]);
  });

  it("rejects a non-array document", () => {
    expect(() => parseDataset({ text: "x" }, "bad")).toThrow('Invalid dataset "bad": must be a list of posts');
  });

  it("names the offending record index", () => {
    expect(() => parseDataset([{ text: "ok" }, { text: "" }], "bad")).toThrow(
      'Invalid dataset "bad":\n  [1] text: text cannot be empty'
    );
  });

  it("freezes posts and their tags", () => {
    const snapshot = parseDataset([{ text: "a", tags: ["x"] }]);
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.posts)).toBe(true);
    expect(Object.isFrozen(snapshot.posts[0])).toBe(true);
    expect(Object.isFrozen(snapshot.posts[0]?.tags)).toBe(true);
  });
});

describe("loadDataset", () => {
  it("returns an empty snapshot when the file is missing", async () => {
    const dir = await mkdtemp(join(tmpdir(), "postcraft-dataset-"));
    const snapshot = await loadDataset(join(dir, "processed_posts.json"));
    expect(snapshot.name).toBe("processed_posts");
    expect(snapshot.posts).toEqual([]);
  });

  it("throws on invalid JSON", async () => {
    const dir = await mkdtemp(join(tmpdir(), "postcraft-dataset-"));
    const file = join(dir, "broken.json");
    await writeFile(file, "[{");
    await expect(loadDataset(file)).rejects.toThrow(/Invalid JSON in dataset/);
  });

  it("round-trips through saveDataset", async () => {
    const dir = await mkdtemp(join(tmpdir(), "postcraft-dataset-"));
    const file = join(dir, "processed_team.json");
    const original = createSnapshot("processed_team", [
      {
        text: "Shipped it",
        tags: ["Launch"],
        language: "English",
        length: "Short",
        lineCount: 1,
        engagement: 40,
        tone: "Casual",
      },
    ]);

    const metadata = await saveDataset(original, file, new Date("2026-02-03T04:05:06.000Z"));
    expect(metadata).toEqual({
      processedAt: "2026-02-03T04:05:06.000Z",
      totalPosts: 1,
      processorVersion: "2.0.0",
    });

    const onDisk = JSON.parse(await readFile(file, "utf-8"));
    expect(onDisk[0]).toEqual({
      text: "Shipped it",
      engagement: 40,
      line_count: 1,
      language: "English",
      tags: ["Launch"],
      length: "Short",
      tone: "Casual",
    });
    expect(metadataPath(file)).toBe(join(dir, "processed_team_metadata.json"));

    const reloaded = await loadDataset(file);
    expect(reloaded.posts).toEqual(original.posts);
  });
});
