/**
 * MCP wiring tests: a client talks to the gateway server over an in-memory
 * transport pair.
 */

import { afterEach, describe, it, expect } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { createLogger } from '../../runtime/utils/logger.js';
import { FakeSessionProvider, ScriptedRunner, type ScriptedRule } from '../../__tests__/fake-graph-store.js';
import { createGatewayServer } from '../mcp-server.js';
import { QueryGateway, REFUSAL_MESSAGE } from '../query-gateway.js';

const silent = createLogger('test', { level: 'silent' });

let client: Client | undefined;

async function connect(rules: ScriptedRule[]): Promise<Client> {
  const gateway = new QueryGateway(new FakeSessionProvider(new ScriptedRunner(rules)), { logger: silent });
  const server = createGatewayServer(gateway, { version: '0.0.1', logger: silent });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();

  await server.connect(serverTransport);
  client = new Client({ name: 'test-client', version: '0.0.1' });
  await client.connect(clientTransport);
  return client;
}

afterEach(async () => {
  await client?.close();
  client = undefined;
});

describe('gateway MCP server', () => {
  it('lists the graph tools', async () => {
    const mcp = await connect([]);
    const { tools } = await mcp.listTools();

    expect(tools.map(tool => tool.name)).toEqual([
      'get_graph_schema',
      'get_graph_stats',
      'sample_nodes',
      'query_runner',
    ]);
  });

  it('runs a read query through query_runner', async () => {
    const mcp = await connect([{ match: /^MATCH/, rows: [{ total: 3 }] }]);

    const result = await mcp.callTool({
      name: 'query_runner',
      arguments: { cypher_q: 'MATCH (n) RETURN count(n) AS total' },
    });

    expect(result).toMatchObject({ content: [{ type: 'text', text: '{"total":3}' }] });
  });

  it('returns the refusal text for a mutation', async () => {
    const mcp = await connect([]);

    const result = await mcp.callTool({ name: 'query_runner', arguments: { cypher_q: 'CREATE (n)' } });

    expect(result).toMatchObject({ content: [{ type: 'text', text: REFUSAL_MESSAGE }] });
  });

  it('turns store errors into error results', async () => {
    const mcp = await connect([{ match: /.*/, error: new Error('Neo.ClientError.Statement.SyntaxError') }]);

    const result = await mcp.callTool({ name: 'get_graph_stats', arguments: {} });

    expect(result).toMatchObject({
      isError: true,
      content: [{ type: 'text', text: 'Error: Neo.ClientError.Statement.SyntaxError' }],
    });
  });

  it('renders the agent prompt with the question', async () => {
    const mcp = await connect([]);

    const prompt = await mcp.getPrompt({
      name: 'cypher_agent_prompt',
      arguments: { user_question: 'Who knows Alice?' },
    });

    expect(prompt.messages).toHaveLength(1);
    expect(prompt.messages[0].role).toBe('user');
    expect(prompt.messages[0].content).toMatchObject({ type: 'text' });
    expect(JSON.stringify(prompt.messages[0].content)).toContain('USER QUESTION:\\nWho knows Alice?');
  });
});
