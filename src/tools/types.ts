export type { Tool, ToolCall, ToolCatalog, ToolResolver, JsonObject, JsonValue } from '../core/types.js';
