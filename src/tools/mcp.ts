import fs from 'fs';
import { z } from 'zod';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport, getDefaultEnvironment } from '@modelcontextprotocol/sdk/client/stdio.js';
import { ConfigurationError, ToolError, errorMessage } from '../core/errors.js';
import { isJsonObject, toJsonObject } from '../core/json.js';
import type { Logger } from '../core/types.js';
import type { JsonObject, JsonValue, Tool } from './types.js';

const CLIENT_NAME = 'agentry';
const CLIENT_VERSION = '0.1.0';

const McpServerSchema = z.object({
  name: z.string().min(1),
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  env: z.record(z.string()).default({})
});

const McpConfigSchema = z.object({
  servers: z.array(McpServerSchema)
});

const CallToolResultSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() }).passthrough()).optional(),
  isError: z.boolean().optional()
}).passthrough();

export type McpServerConfig = z.infer<typeof McpServerSchema>;
export type McpConfig = z.infer<typeof McpConfigSchema>;

export interface McpToolInfo {
  name: string;
  description?: string;
  inputSchema?: unknown;
}

/** One live server session. */
export interface McpConnection {
  listTools(): Promise<McpToolInfo[]>;
  callTool(name: string, args: JsonObject): Promise<unknown>;
  close(): Promise<void>;
}

export type McpConnector = (server: McpServerConfig) => Promise<McpConnection>;

/** Spawns the server as a child process and speaks JSON-RPC over its stdio. */
export const connectStdioServer: McpConnector = async server => {
  const transport = new StdioClientTransport({
    command: server.command,
    args: server.args,
    env: { ...getDefaultEnvironment(), ...server.env },
    stderr: 'ignore'
  });
  const client = new Client({ name: CLIENT_NAME, version: CLIENT_VERSION }, { capabilities: {} });
  await client.connect(transport);

  return {
    listTools: async () => {
      const result = await client.listTools();
      return result.tools;
    },
    callTool: async (name, args) => client.callTool({ name, arguments: args }),
    close: () => client.close()
  };
};

export function readMcpConfig(configPath: string): McpConfig | undefined {
  if (!fs.existsSync(configPath)) {
    return undefined;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Invalid MCP config JSON: ${configPath}: ${errorMessage(error)}`);
  }

  const parsed = McpConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(
      `Invalid MCP config: ${configPath}: ${issue?.path.join('.') ?? ''} ${issue?.message ?? ''}`.trim()
    );
  }
  return parsed.data;
}

/**
 * Flattens a `tools/call` result into text. Text blocks are joined with
 * newlines; a result without any is rendered as pretty JSON.
 */
export function formatCallResult(toolName: string, result: unknown): string {
  const parsed = CallToolResultSchema.safeParse(result);
  if (!parsed.success) {
    throw new ToolError('MCP tool returned a malformed result', toolName);
  }

  const texts: string[] = [];
  for (const block of parsed.data.content ?? []) {
    if (block.type === 'text' && block.text !== undefined) {
      texts.push(block.text);
    }
  }

  const joined = texts.length > 0 ? texts.join('\n') : JSON.stringify(result, null, 2);
  if (parsed.data.isError === true) {
    throw new ToolError(`MCP tool error: ${joined}`, toolName);
  }
  return joined;
}

export function createMcpTool(serverName: string, info: McpToolInfo, connection: McpConnection): Tool {
  const name = `mcp.${serverName}.${info.name}`;
  return {
    name,
    description: `[MCP:${serverName}] ${info.description ?? ''}`,
    parameters: toJsonObject(info.inputSchema) ?? { type: 'object' },
    execute: async (args: JsonValue): Promise<string> => {
      const payload = args === null ? {} : args;
      if (!isJsonObject(payload)) {
        throw new ToolError('MCP tool arguments must be a JSON object', name);
      }
      const result = await connection.callTool(info.name, payload);
      return formatCallResult(name, result);
    }
  };
}

export interface McpToolRegistrar {
  register(tool: Tool): void;
}

export interface McpToolSourceOptions {
  logger?: Logger;
  connector?: McpConnector;
}

/** Connects the configured servers and registers a proxy tool per server tool. */
export class McpToolSource {
  private readonly logger?: Logger;
  private readonly connector: McpConnector;
  private readonly connections = new Map<string, McpConnection>();

  constructor(options: McpToolSourceOptions = {}) {
    this.logger = options.logger;
    this.connector = options.connector ?? connectStdioServer;
  }

  get serverCount(): number {
    return this.connections.size;
  }

  /** Returns the number of tools registered. */
  async load(configPath: string, registry: McpToolRegistrar): Promise<number> {
    const config = readMcpConfig(configPath);
    if (!config) {
      this.logger?.info('MCP config not found', { path: configPath });
      return 0;
    }

    let registered = 0;
    for (const server of config.servers) {
      let connection: McpConnection;
      try {
        connection = await this.connector(server);
      } catch (error) {
        this.logger?.error('MCP server connect failed', { server: server.name, error: errorMessage(error) });
        continue;
      }

      try {
        const tools = await connection.listTools();
        for (const info of tools) {
          registry.register(createMcpTool(server.name, info, connection));
          registered++;
        }
        this.connections.set(server.name, connection);
        this.logger?.info('MCP server connected', { server: server.name, tools: tools.length });
      } catch (error) {
        this.logger?.error('MCP server list tools failed', { server: server.name, error: errorMessage(error) });
        await this.closeConnection(server.name, connection);
      }
    }
    return registered;
  }

  async closeAll(): Promise<void> {
    const open = [...this.connections.entries()];
    this.connections.clear();
    await Promise.all(open.map(([name, connection]) => this.closeConnection(name, connection)));
  }

  private async closeConnection(name: string, connection: McpConnection): Promise<void> {
    try {
      await connection.close();
    } catch (error) {
      this.logger?.warn('MCP server close failed', { server: name, error: errorMessage(error) });
    }
  }
}
