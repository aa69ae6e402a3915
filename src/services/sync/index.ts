export {
  SyncOrchestrator,
  syncTarget,
  tableTarget,
  type RunOptions,
  type SyncProgress,
} from "./orchestrator.js";
export { resolveWindow } from "./window.js";
