/**
 * MCP Server Implementation
 *
 * Exposes the mapping engine as MCP tools over stdio.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';
import { MappingError, attributesSchema, createTraceId, errorMessage } from '@rdg-mapper/core';
import type { Logger, SourceRecord } from '@rdg-mapper/core';
import { TimeoutError, formatBatchReport, withTimeout } from '@rdg-mapper/mapping-core';
import type { MappingEngine } from '@rdg-mapper/mapping-core';
import type { Metrics } from './metrics.js';

export interface ServerOptions {
  name: string;
  version: string;
  engine: MappingEngine;
  metrics: Metrics;
  logger: Logger;
  /** Upper bound for one tool call (default: 120000) */
  toolTimeoutMs?: number;
}

type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

/** Helper to create a text content item */
function textContent(text: string) {
  return { type: 'text' as const, text };
}

/** Helper to create a success result */
function success(data: unknown): ToolResult {
  return { content: [textContent(JSON.stringify(data, null, 2))] };
}

/** Helper to create an error result */
function error(message: string): ToolResult {
  return { content: [textContent(message)], isError: true };
}

export function describeError(err: unknown): string {
  return err instanceof MappingError ? err.toActionableMessage() : errorMessage(err);
}

/** Format errors for MCP response */
function formatError(err: unknown): ToolResult {
  return error(describeError(err));
}

const sourceIdSchema = z.string().min(1).describe('Identifier of the record in its source system');
const categorySchema = z
  .string()
  .min(1)
  .optional()
  .describe('Record category used to pick a fallback id when nothing matches');

const wireRecordSchema = z
  .object({
    source_id: sourceIdSchema,
    attributes: attributesSchema,
    category: categorySchema,
  })
  .strict();

type WireRecord = z.infer<typeof wireRecordSchema>;

function toSourceRecord(input: WireRecord): SourceRecord {
  const record: SourceRecord = { sourceId: input.source_id, attributes: input.attributes };
  if (input.category !== undefined) record.category = input.category;
  return record;
}

export function createServer(options: ServerOptions): McpServer {
  const { engine, metrics } = options;
  const logger = options.logger.child({ component: 'mcp-server' });
  const toolTimeoutMs = options.toolTimeoutMs ?? 120_000;

  const server = new McpServer({
    name: options.name,
    version: options.version,
  });

  /**
   * Timing, timeout, metrics and logging around one tool call. The handler's
   * signal is aborted when the call times out.
   */
  const runTool = async (
    toolName: string,
    handler: (signal: AbortSignal) => Promise<ToolResult>
  ): Promise<ToolResult> => {
    const traceId = createTraceId();
    const controller = new AbortController();
    const start = Date.now();

    try {
      const result = await withTimeout(
        handler(controller.signal),
        toolTimeoutMs,
        () => new TimeoutError(`Tool '${toolName}' timed out after ${toolTimeoutMs}ms`, { tool: toolName })
      );
      const durationMs = Date.now() - start;
      const outcome = result.isError ? 'error' : 'success';
      metrics.observeToolDuration(toolName, durationMs);
      metrics.incTool(toolName, outcome);
      logger.info('Tool invocation completed', { traceId, tool: toolName, durationMs, outcome });
      return result;
    } catch (err) {
      controller.abort();
      const durationMs = Date.now() - start;
      metrics.observeToolDuration(toolName, durationMs);
      metrics.incTool(toolName, 'error');
      logger.error('Tool invocation failed', { traceId, tool: toolName, durationMs, error: err });
      return formatError(err);
    }
  };

  // Tool: map_record
  server.registerTool(
    'map_record',
    {
      description:
        'Map one source record to a reference glossary id. Returns the assigned id, status ' +
        '(Matched, MatchedByFallback, Unmatched, Ambiguous), confidence and the rules that decided it.',
      inputSchema: {
        source_id: sourceIdSchema,
        attributes: attributesSchema.describe('Record attributes, e.g. {"name": "Acme Corp"}'),
        category: categorySchema,
      },
    },
    (args) =>
      runTool('map_record', async (signal) => {
        const result = await engine.mapRecord(toSourceRecord(args), { signal });
        return success(result);
      })
  );

  // Tool: map_batch
  server.registerTool(
    'map_batch',
    {
      description:
        'Map a batch of source records against one glossary generation. ' +
        'Returns a summary by status and the records that need review, or every result with format "json".',
      inputSchema: {
        records: z.array(wireRecordSchema).min(1).max(10_000).describe('Records to map'),
        batch_id: z.string().min(1).optional().describe('Batch id (default: random UUID)'),
        format: z.enum(['text', 'json']).optional().describe('Output format (default: text)'),
      },
    },
    (args) =>
      runTool('map_batch', async (signal) => {
        const report = await engine.mapBatch(args.records.map(toSourceRecord), {
          signal,
          batchId: args.batch_id,
        });
        if (args.format === 'json') {
          return success(report);
        }
        return { content: [textContent(formatBatchReport(report))] };
      })
  );

  // Tool: reload_glossary
  server.registerTool(
    'reload_glossary',
    {
      description:
        'Reload the reference glossary from its source and activate it as a new generation. ' +
        'On failure the previous generation stays active.',
    },
    () =>
      runTool('reload_glossary', async () => {
        try {
          return success(await engine.reload());
        } catch (err) {
          const status = engine.status();
          const active = status.loaded ? `generation ${status.generationId}` : 'none';
          return error(`${describeError(err)}\n\nActive glossary: ${active}`);
        }
      })
  );

  // Tool: glossary_status
  server.registerTool(
    'glossary_status',
    {
      description: 'Show the active glossary generation, entity count, source and the last reload error.',
      annotations: { readOnlyHint: true },
    },
    () => runTool('glossary_status', async () => success(engine.status()))
  );

  // Tool: get_metrics
  server.registerTool(
    'get_metrics',
    {
      description: 'Mapping and tool metrics in the Prometheus text format.',
      annotations: { readOnlyHint: true },
    },
    () => runTool('get_metrics', async () => ({ content: [textContent(metrics.render())] }))
  );

  return server;
}

export async function runServer(options: ServerOptions): Promise<void> {
  const { logger, engine } = options;
  const server = createServer(options);

  const shutdown = async (signal: string) => {
    try {
      engine.reference.stopAutoReload();
      await server.close();
      logger.info('Shutdown complete', { signal });
    } finally {
      process.exit(0);
    }
  };

  const transport = new StdioServerTransport();

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  await server.connect(transport);

  logger.info('MCP server started', {
    name: options.name,
    version: options.version,
    transport: 'stdio',
    glossary: engine.status().source,
    generationId: engine.status().generationId,
  });
}
