import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ErrorCode, ListToolsRequestSchema, McpError } from '@modelcontextprotocol/sdk/types.js';
import { invokeTool } from '../catalog/invoke.js';
import { loadCatalog } from '../catalog/loader.js';
import type { LiveTool } from '../catalog/types.js';
import { ERROR_PREFIX } from '../model/conventions.js';
import { kindOfDeclaredType, parameterDomain } from '../model/domain.js';
import type { ToolContext } from '../runtime/index.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Tool Server
 *
 * Exposes a catalog's live tools over MCP. Input schemas come from the
 * extracted definitions, so what a client sees is what the validator saw.
 */

export interface ServerInfo {
  name: string;
  version: string;
}

const DEFAULT_INFO: ServerInfo = { name: 'tool-conformance', version: '1.0.0' };

interface PropertySchema {
  type?: 'string' | 'number' | 'boolean';
  description?: string;
  enum?: string[];
  minimum?: number;
  maximum?: number;
}

/**
 * JSON schema for a tool's parameters
 */
export function inputSchemaOf(tool: LiveTool): {
  type: 'object';
  properties: Record<string, PropertySchema>;
  required: string[];
} {
  const { definition } = tool;
  const properties: Record<string, PropertySchema> = {};
  const required: string[] = [];

  for (const parameter of definition.parameters) {
    const property: PropertySchema = {};
    const kind = kindOfDeclaredType(parameter.declaredType);
    if (kind) {
      property.type = kind;
    }
    const description = definition.docstring.argSections[parameter.name];
    if (description) {
      property.description = description;
    }

    const domain = parameterDomain(definition, parameter);
    if (domain?.kind === 'range') {
      property.minimum = domain.min;
      property.maximum = domain.max;
    } else if (domain?.kind === 'choice') {
      property.enum = [...domain.choices];
    }

    properties[parameter.name] = property;
    if (!parameter.isOptional) {
      required.push(parameter.name);
    }
  }

  return { type: 'object', properties, required };
}

/**
 * Create an MCP server answering tools/list and tools/call for the given tools
 */
export function createToolServer(
  tools: readonly LiveTool[],
  context: ToolContext,
  info: ServerInfo = DEFAULT_INFO
): Server {
  const byName = new Map(tools.map((tool) => [tool.name, tool]));

  const server = new Server(info, {
    capabilities: {
      tools: {},
    },
  });

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: tools.map((tool) => ({
        name: tool.name,
        description: tool.definition.docstring.summary,
        inputSchema: inputSchemaOf(tool),
      })),
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    const tool = byName.get(name);
    if (!tool) {
      throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
    }

    let result: unknown;
    try {
      result = await invokeTool(tool, context, args ?? {});
    } catch (error) {
      logger.error('Tool raised', { tool: name, error: errorMessage(error) });
      throw new McpError(ErrorCode.InternalError, errorMessage(error));
    }

    if (typeof result !== 'string') {
      throw new McpError(ErrorCode.InternalError, `Tool ${name} returned non-text output`);
    }

    return {
      content: [
        {
          type: 'text',
          text: result,
        },
      ],
      isError: result.startsWith(ERROR_PREFIX),
    };
  });

  return server;
}

/**
 * Load a catalog and serve it on stdio
 */
export async function serveCatalog(catalogPath: string, context: ToolContext, info?: ServerInfo): Promise<Server> {
  const catalog = await loadCatalog(catalogPath);
  const server = createToolServer(catalog.tools, context, info);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info('Tool server running on stdio', { catalog: catalog.filePath, tools: catalog.tools.length });

  return server;
}
