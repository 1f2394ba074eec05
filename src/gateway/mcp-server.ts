/**
 * MCP server exposing the query gateway
 *
 * stdout carries the JSON-RPC stream: never log to it.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { describeError } from '../errors.js';
import { createLogger, type Logger } from '../runtime/utils/logger.js';
import { generateGraphQueryToolHandlers, generateGraphQueryTools } from '../tools/graph-query-tools.js';
import { CYPHER_AGENT_PROMPT_NAME, renderCypherAgentPrompt } from './agent-prompt.js';
import type { QueryGateway } from './query-gateway.js';

export interface GatewayServerOptions {
  name?: string;
  version?: string;
  logger?: Logger;
}

export function createGatewayServer(gateway: QueryGateway, options: GatewayServerOptions = {}): McpServer {
  const logger = options.logger ?? createLogger('McpServer');
  const server = new McpServer({
    name: options.name ?? 'graph_search',
    version: options.version ?? '0.0.0',
  });

  const handlers = generateGraphQueryToolHandlers(gateway);

  for (const tool of generateGraphQueryTools()) {
    const handler = handlers[tool.name];
    if (!handler) {
      throw new Error(`No handler registered for tool "${tool.name}"`);
    }

    server.tool(tool.name, tool.description, tool.inputSchema, async (args) => {
      try {
        const text = await handler(args);
        return { content: [{ type: 'text' as const, text }] };
      } catch (error) {
        const message = describeError(error);
        logger.error(`Tool ${tool.name} failed`, { error: message });
        return { content: [{ type: 'text' as const, text: `Error: ${message}` }], isError: true };
      }
    });
  }

  server.prompt(
    CYPHER_AGENT_PROMPT_NAME,
    'Instructions for turning a question into read-only Cypher using the graph tools',
    { user_question: z.string().describe('The question to answer from the graph') },
    ({ user_question }) => ({
      messages: [
        {
          role: 'user' as const,
          content: { type: 'text' as const, text: renderCypherAgentPrompt(user_question) },
        },
      ],
    })
  );

  return server;
}
