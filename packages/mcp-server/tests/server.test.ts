import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { EmptyGlossaryError, silentLogger } from '@rdg-mapper/core';
import type { GlossaryEntry, IGlossarySource } from '@rdg-mapper/core';
import { createMappingEngine } from '@rdg-mapper/mapping-core';
import type { MappingEngine } from '@rdg-mapper/mapping-core';
import { Metrics } from '../src/metrics.js';
import { createServer } from '../src/server.js';

class ListSource implements IGlossarySource {
  readonly name = 'test-glossary';
  failNext = false;

  async loadGlossary(): Promise<GlossaryEntry[]> {
    if (this.failNext) throw new EmptyGlossaryError();
    return [
      { id: 'R1', attributes: { name: 'Acme Corporation' } },
      { id: 'R2', attributes: { name: 'Beta Industries' } },
    ];
  }
}

async function call(client: Client, name: string, args: Record<string, unknown> = {}) {
  const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
  const [first] = result.content;
  if (!first || first.type !== 'text') throw new Error(`Tool ${name} returned no text`);
  return { text: first.text, isError: result.isError === true };
}

describe('MCP server', () => {
  let source: ListSource;
  let engine: MappingEngine;
  let metrics: Metrics;
  let server: McpServer;
  let client: Client;

  beforeEach(async () => {
    source = new ListSource();
    metrics = new Metrics();
    engine = createMappingEngine({ source, listener: metrics, reloadRetry: { attempts: 1 } });
    await engine.reload();

    server = createServer({ name: 'rdg-mapper-test', version: '0.0.0', engine, metrics, logger: silentLogger });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    client = new Client({ name: 'test-client', version: '0.0.0' });
    await client.connect(clientTransport);
  });

  afterEach(async () => {
    await client.close();
    await server.close();
  });

  it('lists the mapping tools', async () => {
    const { tools } = await client.listTools();

    expect(tools.map((t) => t.name).sort()).toEqual([
      'get_metrics',
      'glossary_status',
      'map_batch',
      'map_record',
      'reload_glossary',
    ]);
  });

  it('maps one record', async () => {
    const { text, isError } = await call(client, 'map_record', {
      source_id: 's1',
      attributes: { name: 'Acme Corporation' },
    });

    expect(isError).toBe(false);
    expect(JSON.parse(text)).toEqual({
      sourceId: 's1',
      assignedId: 'R1',
      confidence: 1,
      decisionPath: ['ExactAcceptRule'],
      status: 'Matched',
      generationId: 1,
      matchedOn: ['name'],
    });
  });

  it('returns a text report for a batch', async () => {
    const { text } = await call(client, 'map_batch', {
      batch_id: 'b1',
      records: [
        { source_id: 's1', attributes: { name: 'Acme Corporation' } },
        { source_id: 's2', attributes: { name: 'Quux' } },
      ],
    });

    const lines = text.split('\n');
    expect(lines[0]).toBe('## Mapping Batch b1');
    expect(lines).toContain('- Matched: 1');
    expect(lines).toContain('- Unmatched: 1');
    expect(lines).toContain('- Match Rate: 50.0%');
  });

  it('returns every result as JSON on request', async () => {
    const { text } = await call(client, 'map_batch', {
      format: 'json',
      records: [{ source_id: 's1', attributes: { name: 'Beta Industries' } }],
    });

    const report = JSON.parse(text);
    expect(report.summary.total).toBe(1);
    expect(report.results[0].assignedId).toBe('R2');
  });

  it('reports glossary status and reloads', async () => {
    const before = JSON.parse((await call(client, 'glossary_status')).text);
    expect(before).toMatchObject({ loaded: true, generationId: 1, entityCount: 2, source: 'test-glossary' });

    const reloaded = JSON.parse((await call(client, 'reload_glossary')).text);
    expect(reloaded.generationId).toBe(2);
  });

  it('keeps the active generation when a reload fails', async () => {
    source.failNext = true;

    const { text, isError } = await call(client, 'reload_glossary');

    expect(isError).toBe(true);
    expect(text.startsWith('Error [EMPTY_GLOSSARY]: Reference glossary is empty')).toBe(true);
    expect(text.endsWith('Active glossary: generation 1')).toBe(true);
    expect(engine.status().generationId).toBe(1);
  });

  it('exposes metrics for mapped records and tool calls', async () => {
    await call(client, 'map_record', { source_id: 's1', attributes: { name: 'Acme Corporation' } });

    const lines = (await call(client, 'get_metrics')).text.split('\n');

    expect(lines).toContain('rdg_mapper_records_total{status="Matched"} 1');
    expect(lines).toContain('rdg_mapper_tool_requests_total{outcome="success",tool="map_record"} 1');
    expect(lines).toContain('rdg_mapper_glossary_generation 1');
  });
});
