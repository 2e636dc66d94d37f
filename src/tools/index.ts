/**
 * Tools Module
 *
 * Tool descriptors, discovery and the host-facing plugin tools.
 */

// Default Descriptors
export { createDefaultTools } from "./defaults.js";

// Discovery
export { identifySuitableTools, keywordHits } from "./discovery.js";

// Plugin Tools
export {
  createPluginTools,
  createEnhancedThinkingTool,
  createToolDiscoveryTool,
  createPlanningTool,
  createAdaptationTool,
  createPluginInfoTool,
} from "./plugin.js";
