import { describe, it, expect, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { analyzeDataset } from "../analytics.js";
import { buildAnalyticsReport, defaultReportPath, exportAnalyticsReport } from "../report.js";
import { sampleSnapshot } from "./fixtures.js";

const now = new Date("2026-03-04T05:06:07.000Z");
let dir: string | undefined;

afterEach(async () => {
  if (dir) await rm(dir, { recursive: true, force: true });
  dir = undefined;
});

describe("buildAnalyticsReport", () => {
  it("wraps the dataset analytics with its origin", () => {
    const report = buildAnalyticsReport(sampleSnapshot(), now);
    expect(report.generatedAt).toBe("2026-03-04T05:06:07.000Z");
    expect(report.dataset).toBe("sample");
    expect(report.totalPosts).toBe(4);
    expect(report.analytics).toEqual(analyzeDataset(sampleSnapshot()));
  });
});

describe("defaultReportPath", () => {
  it("stamps the file name with the UTC time", () => {
    expect(defaultReportPath("data", now)).toBe("data/analytics_report_20260304_050607.json");
  });
});

describe("exportAnalyticsReport", () => {
  it("writes the report as JSON", async () => {
    dir = await mkdtemp(join(tmpdir(), "postcraft-report-"));
    const file = join(dir, "reports", "report.json");
    const report = await exportAnalyticsReport(sampleSnapshot(), file, now);
    expect(JSON.parse(await readFile(file, "utf-8"))).toEqual(report);
  });
});
