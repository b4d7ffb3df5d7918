/**
 * @rdg-mapper/mcp-server
 *
 * MCP server and CLI for the RDG mapping engine
 */

export { createServer, runServer } from './server.js';
export type { ServerOptions } from './server.js';
export { Metrics, labelsToKey } from './metrics.js';
export type { MetricsOptions, ToolOutcome } from './metrics.js';
export {
  configFileSchema,
  expandEnvVars,
  loadConfig,
  parseConfig,
} from './config.js';
export type { ConfigFile, EnvExpansionOptions, GlossaryEntryConfig, LoadedConfig, OutputConfig } from './config.js';
export { createEngineFromConfig, createGlossarySource, createResultSink } from './engine-factory.js';
export type { EngineFactoryOptions } from './engine-factory.js';
export { main, runMapCommand, runServeCommand, sinkForPath, USAGE } from './commands.js';
export type { CommandIO, MapCommandOptions } from './commands.js';
