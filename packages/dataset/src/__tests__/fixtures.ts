import type { ExamplePost } from "@postcraft/core";
import { createSnapshot, type DatasetSnapshot } from "../load.js";

export function post(overrides: Partial<ExamplePost> & { text: string }): ExamplePost {
  return {
    tags: [],
    language: "English",
    length: "Medium",
    lineCount: 6,
    engagement: 0,
    ...overrides,
  };
}

export function sampleSnapshot(): DatasetSnapshot {
  return createSnapshot("sample", [
    post({ text: "Got my first internship offer! #Internship", tags: ["Internship"], engagement: 50, tone: "Inspirational" }),
    post({ text: "Placement season tips for juniors", tags: ["Placements", "Career"], engagement: 120, length: "Long", lineCount: 12 }),
    post({ text: "Hackathon jeet liya 🚀🚀 #hackathon #teamwork", tags: ["Hackathon"], language: "Hinglish", engagement: 30, length: "Short", lineCount: 3 }),
    post({ text: "Career switch story @mentor", tags: ["career"], engagement: 0, targetAudience: "Professionals" }),
  ]);
}
