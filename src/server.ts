/**
 * proverb-trawl MCP Server
 *
 * MCP server exposing the trawling pipeline as tools:
 * tokenize, extract-ngrams, score-novelty and trawl.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
    CallToolRequestSchema,
    CallToolResult,
    ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import {
    TrawlException,
    createGenericError,
    serializeTrawlError,
} from './types/index.js';
import * as Handlers from './handlers/trawl.js';
import { TOOLS } from './tools/definitions.js';
import { VERSION } from './version.js';

type ToolHandler = (args: unknown) => Promise<unknown> | unknown;

export const toolHandlers: Record<string, ToolHandler> = {
    'tokenize': (args) => Handlers.tokenizeHandler(args),
    'extract-ngrams': (args) => Handlers.extractNgramsHandler(args),
    'score-novelty': (args) => Handlers.scoreNoveltyHandler(args),
    'trawl': (args) => Handlers.trawlHandler(args),
};

function textResult(value: unknown, isError: boolean = false): CallToolResult {
    return {
        content: [
            {
                type: 'text',
                text: JSON.stringify(value, null, 2),
            },
        ],
        ...(isError && { isError: true }),
    };
}

/**
 * Run one tool call, turning failures into MCP error results.
 */
export async function callTool(name: string, args: unknown): Promise<CallToolResult> {
    try {
        const handler = toolHandlers[name];
        if (!handler) {
            throw createGenericError('UNKNOWN_TOOL', `Unknown tool: ${name}`);
        }
        return textResult(await handler(args ?? {}));
    } catch (error) {
        if (error instanceof TrawlException) {
            return textResult(serializeTrawlError(error.error), true);
        }

        const errorMessage = error instanceof Error ? error.message : String(error);
        console.error(`Tool ${name} failed:`, error);
        return textResult({
            error: errorMessage,
            type: error instanceof Error ? error.constructor.name : 'Error',
        }, true);
    }
}

/**
 * Create and configure the MCP server
 */
export function createServer(): Server {
    const server = new Server(
        {
            name: 'proverb-trawl',
            version: VERSION,
        },
        {
            capabilities: {
                tools: {},
            },
        }
    );

    server.setRequestHandler(ListToolsRequestSchema, async () => {
        return { tools: TOOLS };
    });

    server.setRequestHandler(CallToolRequestSchema, async (request) => {
        const { name, arguments: args } = request.params;
        return callTool(name, args);
    });

    return server;
}

/**
 * Run the MCP server over stdio until the transport closes.
 */
export async function runServer(): Promise<void> {
    const server = createServer();
    const transport = new StdioServerTransport();
    const closed = new Promise<void>(resolve => {
        server.onclose = () => resolve();
    });
    await server.connect(transport);
    console.error(`proverb-trawl MCP server ${VERSION} listening on stdio`);
    await closed;
}
