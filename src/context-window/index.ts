export {
  compareContextWindows,
  loadContextWindows,
  mergeContextWindows,
  parseContextWindows,
} from "./context-windows.js";
export type { ContextWindow, ContextWindowUsage } from "./types.js";
