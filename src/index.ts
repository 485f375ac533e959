#!/usr/bin/env node

/**
 * Xcode project sorter MCP Server
 * Exposes project.pbxproj sorting and checking via MCP tools
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  CallToolResult,
} from '@modelcontextprotocol/sdk/types.js';
import {
  handleSortProject,
  handleCheckProject,
  handleSortText,
  handleListRules,
} from './handlers.js';
import { loadConfig, SorterConfig } from './config.js';
import { PROTECTED_SECTION } from './parser.js';
import packageJson from '../package.json';

// Create server instance
const server = new Server(
  {
    name: 'pbxsort',
    version: packageJson.version,
  },
  {
    capabilities: {
      tools: {},
    },
    instructions: `Use sort_project after editing an Xcode project.pbxproj to canonicalize its order. Use check_project to see which regions are unsorted without writing. Frameworks build phases are never reordered.`,
  }
);

const CASE_INSENSITIVE_PROPERTY = {
  type: 'boolean',
  description: 'Case-insensitive natural sort. Defaults to the configured mode.',
};

/**
 * List available tools
 */
server.setRequestHandler(ListToolsRequestSchema, async () => {
  return {
    tools: [
      {
        name: 'sort_project',
        description:
          'Sort arrays and safe sections of a project.pbxproj in place. Removes duplicate entries. Atomic write.',
        inputSchema: {
          type: 'object',
          properties: {
            file_path: {
              type: 'string',
              description: 'Path to project.pbxproj or its .xcodeproj bundle',
            },
            case_insensitive: CASE_INSENSITIVE_PROPERTY,
          },
          required: ['file_path'],
        },
      },
      {
        name: 'check_project',
        description: 'Report unsorted regions and duplicates in a project.pbxproj. Never writes.',
        inputSchema: {
          type: 'object',
          properties: {
            file_path: {
              type: 'string',
              description: 'Path to project.pbxproj or its .xcodeproj bundle',
            },
            case_insensitive: CASE_INSENSITIVE_PROPERTY,
          },
          required: ['file_path'],
        },
      },
      {
        name: 'sort_text',
        description: 'Sort project.pbxproj content passed inline. Returns the sorted text.',
        inputSchema: {
          type: 'object',
          properties: {
            text: {
              type: 'string',
              description: 'Full project.pbxproj content',
            },
            case_insensitive: CASE_INSENSITIVE_PROPERTY,
          },
          required: ['text'],
        },
      },
      {
        name: 'list_rules',
        description: 'List sorted arrays, sorted sections, protected sections, and known files',
        inputSchema: {
          type: 'object',
          properties: {},
        },
      },
    ],
  };
});

/**
 * Setup request handlers with configuration
 *
 * Creates closure over config to avoid global mutable state
 */
function setupRequestHandlers(config: SorterConfig): void {
  /**
   * Handle tool calls
   */
  server.setRequestHandler(CallToolRequestSchema, async (request): Promise<CallToolResult> => {
    const { name, arguments: args } = request.params;

    try {
      switch (name) {
        case 'sort_project':
          return handleSortProject(args, config);

        case 'check_project':
          return handleCheckProject(args, config);

        case 'sort_text':
          return handleSortText(args, config);

        case 'list_rules':
          return handleListRules(args, config);

        default:
          throw new Error(`Unknown tool: ${name}`);
      }
    } catch (error) {
      if (error instanceof Error) {
        throw error;
      }
      throw new Error(`Tool execution failed: ${String(error)}`);
    }
  });
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Log the rules this server will apply
 */
function logRules(config: SorterConfig): void {
  console.error(`[pbxsort] config: ${config.source ?? 'built-in defaults'}`);
  console.error(
    `[pbxsort] ${config.sortableSections.length} sortable section(s), ` +
      `${config.knownFiles.length} known file(s), ` +
      `${config.caseInsensitive ? 'case-insensitive' : 'case-sensitive'}`
  );
  console.error(`[pbxsort] never reordered: ${PROTECTED_SECTION}`);
}

async function main(): Promise<void> {
  let config: SorterConfig;
  try {
    config = loadConfig();
  } catch (error) {
    console.error(`[pbxsort] cannot start: ${describeError(error)}`);
    process.exit(1);
  }

  logRules(config);
  setupRequestHandlers(config);

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      console.error(`[SHUTDOWN] ${signal}`);
      process.exit(0);
    });
  }

  await server.connect(new StdioServerTransport());
  console.error('[pbxsort] MCP server listening on stdio');
}

main().catch((error: unknown) => {
  console.error(`[pbxsort] fatal: ${describeError(error)}`);
  process.exit(1);
});
