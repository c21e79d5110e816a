export {
  createExtensionTable,
  loadExtensionTable,
  parseExtensionGroups,
  withExtensionOverrides,
} from "./extension-table.js";
export {
  BINARY_PROBE_BYTES,
  isAnalyzable,
  isBinary,
  isKnownExtension,
  normalizeExtension,
  technologyOf,
} from "./file-classifier.js";
export {
  DEFAULT_EXCLUDED_DIRECTORIES,
  resolveRoot,
  walkCandidates,
} from "./file-discovery.js";
export { isGitUrl, loadTarget } from "./repo-loader.js";
export type {
  Candidate,
  ExtensionGroup,
  ExtensionTable,
  LoadedTarget,
  WalkEvent,
  WalkOptions,
} from "./types.js";
