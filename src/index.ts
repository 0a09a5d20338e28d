// askweb - library entry
// The CLI lives in cli.ts; these exports let other programs embed the pieces

export { loadConfig, logConfiguration, DEFAULT_TOOL_SERVER_URL } from './env.js';
export type { AppConfig, ClaudeConfig, ToolServiceConfig, SearchConfig, ServerConfig } from './env.js';
export { logger, createChildLogger } from './logger.js';
export { AppError, ErrorCode, EXIT_CODES, formatErrorLine, toAppError } from './utils/errors.js';
export { buildToolServer } from './app.js';
export { startToolServer } from './server.js';
export { DuckDuckGoSearchGateway } from './services/web-search.js';
export type { SearchGateway, SearchResult } from './services/web-search.js';
export * from './services/tools/index.js';
export * from './services/dispatcher/index.js';
export * from './services/orchestrator/index.js';
export * from './providers/index.js';
export { runAsk, createAssistant } from './cli/ask.js';
export type { AskIo, AskOptions, Assistant } from './cli/ask.js';
