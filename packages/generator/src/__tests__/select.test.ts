import { describe, it, expect } from "vitest";
import { createSnapshot, emptySnapshot } from "@postcraft/dataset";
import { rankByEngagement, selectExamples } from "../select.js";
import { post } from "./fixtures.js";

const criteria = { tags: ["Internship"], length: "Medium", language: "English" } as const;

function texts(selection: { examples: { text: string }[] }): string[] {
  return selection.examples.map((p) => p.text);
}

describe("selectExamples", () => {
  it("ranks exact matches by engagement", () => {
    const dataset = createSnapshot("d", [
      post({ text: "Post A", engagement: 50 }),
      post({ text: "Post B", engagement: 90 }),
    ]);
    const selection = selectExamples(dataset, criteria);
    expect(texts(selection)).toEqual(["Post B", "Post A"]);
    expect(selection.relaxation).toBe("exact");
    expect(selection.warnings).toEqual([]);
  });

  it("keeps dataset order for equal engagement", () => {
    const dataset = createSnapshot("d", [
      post({ text: "first", engagement: 10 }),
      post({ text: "second", engagement: 10 }),
      post({ text: "third", engagement: 10 }),
    ]);
    expect(texts(selectExamples(dataset, criteria))).toEqual(["first", "second"]);
  });

  it("never returns more than two examples", () => {
    const dataset = createSnapshot("d", [
      post({ text: "a", engagement: 1 }),
      post({ text: "b", engagement: 2 }),
      post({ text: "c", engagement: 3 }),
    ]);
    expect(selectExamples(dataset, { ...criteria, limit: 5 }).examples).toHaveLength(2);
    expect(texts(selectExamples(dataset, { ...criteria, limit: 1 }))).toEqual(["c"]);
    expect(selectExamples(dataset, { ...criteria, limit: -3 }).examples).toEqual([]);
  });

  it("matches tags ignoring case and surrounding spaces", () => {
    const dataset = createSnapshot("d", [post({ text: "tagged", tags: ["  INTERNSHIP "] })]);
    const selection = selectExamples(dataset, { ...criteria, tags: ["internship"] });
    expect(texts(selection)).toEqual(["tagged"]);
    expect(selection.relaxation).toBe("exact");
  });

  it("accepts the wanted tags as a set", () => {
    const dataset = createSnapshot("d", [
      post({ text: "career", tags: ["Career"], engagement: 5 }),
      post({ text: "other", tags: ["Hiring"], engagement: 99 }),
    ]);
    const selection = selectExamples(dataset, { ...criteria, tags: new Set(["career", "Internship"]) });
    expect(texts(selection)).toEqual(["career"]);
    expect(selection.relaxation).toBe("exact");
  });

  it("prefers an exact match over a more engaging partial one", () => {
    const dataset = createSnapshot("d", [
      post({ text: "long", length: "Long", engagement: 500 }),
      post({ text: "exact", engagement: 5 }),
    ]);
    expect(texts(selectExamples(dataset, criteria))).toEqual(["exact"]);
  });

  it("drops the length constraint first", () => {
    const dataset = createSnapshot("d", [
      post({ text: "hinglish medium", language: "Hinglish", engagement: 100 }),
      post({ text: "english long", length: "Long", engagement: 20 }),
    ]);
    const selection = selectExamples(dataset, criteria);
    expect(texts(selection)).toEqual(["english long"]);
    expect(selection.relaxation).toBe("any-length");
    expect(selection.warnings).toEqual([
      {
        kind: "relaxed_match",
        relaxation: "any-length",
        message: "No exact match; using examples of another length",
      },
    ]);
  });

  it("drops the language constraint next", () => {
    const dataset = createSnapshot("d", [
      post({ text: "other tag", tags: ["Career"], engagement: 100 }),
      post({ text: "hinglish", language: "Hinglish", length: "Short", engagement: 20 }),
    ]);
    const selection = selectExamples(dataset, criteria);
    expect(texts(selection)).toEqual(["hinglish"]);
    expect(selection.relaxation).toBe("any-language");
  });

  it("falls back to the most engaging posts when no tag matches", () => {
    const dataset = createSnapshot("d", [
      post({ text: "low", tags: ["Career"], engagement: 1 }),
      post({ text: "high", tags: ["Hackathon"], engagement: 70 }),
      post({ text: "mid", tags: ["Travel"], engagement: 30 }),
    ]);
    const selection = selectExamples(dataset, criteria);
    expect(texts(selection)).toEqual(["high", "mid"]);
    expect(selection.relaxation).toBe("any-tag");
    expect(selection.warnings[0]?.kind).toBe("relaxed_match");
  });

  it("returns no examples and a warning for an empty dataset", () => {
    const selection = selectExamples(emptySnapshot("blank"), criteria);
    expect(selection).toEqual({
      examples: [],
      relaxation: "none",
      warnings: [
        {
          kind: "empty_dataset",
          message: 'Dataset "blank" has no posts; the prompt will carry no examples',
        },
      ],
    });
  });

  it("gives the same result on repeated calls", () => {
    const dataset = createSnapshot("d", [
      post({ text: "x", engagement: 3 }),
      post({ text: "y", engagement: 9, language: "Hinglish" }),
    ]);
    expect(selectExamples(dataset, criteria)).toEqual(selectExamples(dataset, criteria));
  });

  it("returns posts of the requested language and length whenever an exact match exists", () => {
    const dataset = createSnapshot("d", [
      post({ text: "long", length: "Long", engagement: 99 }),
      post({ text: "hinglish", language: "Hinglish", engagement: 98 }),
      post({ text: "exact one", engagement: 4 }),
      post({ text: "exact two", engagement: 7 }),
    ]);
    const { examples } = selectExamples(dataset, criteria);
    expect(examples.length).toBeGreaterThan(0);
    for (const example of examples) {
      expect(example.language).toBe("English");
      expect(example.length).toBe("Medium");
    }
    expect(examples.map((p) => p.engagement)).toEqual([7, 4]);
  });
});

describe("rankByEngagement", () => {
  it("does not reorder its input", () => {
    const posts = [post({ text: "a", engagement: 1 }), post({ text: "b", engagement: 2 })];
    expect(rankByEngagement(posts).map((p) => p.text)).toEqual(["b", "a"]);
    expect(posts.map((p) => p.text)).toEqual(["a", "b"]);
  });
});
