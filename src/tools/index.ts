export { handleToolCall, type ToolCallResult } from './dispatcher.js';
export {
  TOOL_SPECS,
  getToolSpec,
  getToolSpecs,
  getTools,
  isToolExposed,
  type ToolExposureMode,
  type ToolSpec,
} from './registry.js';
