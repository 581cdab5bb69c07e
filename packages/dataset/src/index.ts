export {
  loadDataset,
  parseDataset,
  createSnapshot,
  emptySnapshot,
  normalizeRecord,
  datasetNameFromPath,
  RawPostRecordSchema,
  type DatasetSnapshot,
  type RawPostRecord,
} from "./load.js";
export {
  saveDataset,
  toFileRecord,
  metadataPath,
  PROCESSOR_VERSION,
  type DatasetFileRecord,
  type DatasetMetadata,
} from "./save.js";
export {
  countLines,
  countContentLines,
  categorizeLength,
  normalizeTag,
  ensureTags,
} from "./normalize.js";
export { datasetStatistics, tagFrequencies, type DatasetStatistics } from "./stats.js";
export {
  searchPosts,
  postsByEngagement,
  appendPosts,
  mergeDatasets,
  type SearchField,
} from "./query.js";
export {
  listDatasets,
  listRawDatasets,
  checkDatasetFile,
  isProcessedDataset,
  displayName,
  type DatasetEntry,
  type DatasetCheck,
} from "./catalog.js";
export {
  analyzeDataset,
  postMetrics,
  engagementAnalytics,
  contentAnalytics,
  engagementBy,
  performanceInsights,
  formatInsights,
  type PostMetrics,
  type EngagementAnalytics,
  type ContentAnalytics,
  type GroupEngagement,
  type Insight,
  type DatasetAnalytics,
} from "./analytics.js";
export { countHashtags, countEmojis, countMentions, countWords } from "./helpers.js";
export {
  buildAnalyticsReport,
  exportAnalyticsReport,
  defaultReportPath,
  type AnalyticsReport,
} from "./report.js";
