import { mkdir, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { createChildLogger } from "@postcraft/core";
import { analyzeDataset, type DatasetAnalytics } from "./analytics.js";
import type { DatasetSnapshot } from "./load.js";

const logger = createChildLogger({ module: "dataset:report" });

export interface AnalyticsReport {
  generatedAt: string;
  dataset: string;
  totalPosts: number;
  analytics: DatasetAnalytics;
}

export function buildAnalyticsReport(
  snapshot: DatasetSnapshot,
  now: Date = new Date()
): AnalyticsReport {
  return {
    generatedAt: now.toISOString(),
    dataset: snapshot.name,
    totalPosts: snapshot.posts.length,
    analytics: analyzeDataset(snapshot),
  };
}

/** `<dataDir>/analytics_report_YYYYMMDD_HHMMSS.json`, in UTC. */
export function defaultReportPath(dataDir: string, now: Date = new Date()): string {
  const stamp = now.toISOString().slice(0, 19).replace(/[-:]/g, "").replace("T", "_");
  return join(dataDir, `analytics_report_${stamp}.json`);
}

export async function exportAnalyticsReport(
  snapshot: DatasetSnapshot,
  filePath: string,
  now: Date = new Date()
): Promise<AnalyticsReport> {
  const report = buildAnalyticsReport(snapshot, now);
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, JSON.stringify(report, null, 2) + "\n", "utf-8");
  logger.info({ filePath, totalPosts: report.totalPosts }, "Analytics report exported");
  return report;
}
