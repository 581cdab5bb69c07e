import type { ExamplePost, GenerationRequest } from "@postcraft/core";

export function post(overrides: Partial<ExamplePost> & { text: string }): ExamplePost {
  return {
    tags: ["Internship"],
    language: "English",
    length: "Medium",
    lineCount: 6,
    engagement: 0,
    ...overrides,
  };
}

export function request(overrides: Partial<GenerationRequest> = {}): GenerationRequest {
  return {
    topic: "Internship",
    length: "Medium",
    language: "English",
    tone: "Professional",
    includeHashtags: false,
    includeEmojis: false,
    callToAction: false,
    ...overrides,
  };
}
