import { ToolRegistry, TOOL_PROTOCOL, BASE_SYSTEM_PROMPT } from './registry.js';
import type { Tool, ToolCall, ToolCatalog, ToolResolver, JsonObject, JsonValue } from './types.js';
import { bashTool, isDangerousCommand } from './bash.js';
import { subagentTool } from './subagent.js';
import {
  McpToolSource,
  connectStdioServer,
  createMcpTool,
  formatCallResult,
  readMcpConfig,
  type McpConfig,
  type McpConnection,
  type McpConnector,
  type McpServerConfig,
  type McpToolInfo
} from './mcp.js';

export { ToolRegistry, TOOL_PROTOCOL, BASE_SYSTEM_PROMPT };
export type { Tool, ToolCall, ToolCatalog, ToolResolver, JsonObject, JsonValue };
export { bashTool, isDangerousCommand };
export { subagentTool };
export { McpToolSource, connectStdioServer, createMcpTool, formatCallResult, readMcpConfig };
export type { McpConfig, McpConnection, McpConnector, McpServerConfig, McpToolInfo };

export function createBuiltinTools(): Tool[] {
  return [bashTool, subagentTool];
}
