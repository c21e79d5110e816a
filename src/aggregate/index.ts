export { DEFAULT_CONCURRENCY, aggregate } from "./aggregator.js";
export { ReportBuilder } from "./report-builder.js";
export { work } from "./worker-pool.js";
export type {
  AggregateObserver,
  AggregateOptions,
  CountMap,
  FileError,
  FileErrorKind,
  FileRecord,
  TokenReport,
} from "./types.js";
