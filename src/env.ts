// Environment configuration for askweb
// Read once at startup; components receive the slice they need through their constructors

import { createChildLogger } from './logger.js';

const log = createChildLogger('config');

type EnvSource = Record<string, string | undefined>;

const strEnv = (value: string | undefined, fallback = '') => (value ?? fallback).trim() || fallback;

function parsePort(value: string | undefined, defaultPort: number): number {
  if (!value) return defaultPort;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1 || parsed > 65535) {
    log.warn({ value, defaultPort }, 'Invalid PORT, using default');
    return defaultPort;
  }
  return parsed;
}

function parsePositiveInt(value: string | undefined, defaultValue: number, name: string): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1) {
    log.warn({ name, value, defaultValue }, 'Invalid numeric setting, using default');
    return defaultValue;
  }
  return parsed;
}

function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

export interface ClaudeConfig {
  apiKey: string;
  apiUrl: string;
  apiVersion: string;
  model: string;
  maxTokens: number;
  timeoutMs: number;
}

export interface ToolServiceConfig {
  baseUrl: string;
  healthTimeoutMs: number;
  callTimeoutMs: number;
  maxAttempts: number;
  retryBaseDelayMs: number;
}

export interface SearchConfig {
  endpoint: string;
  timeoutMs: number;
}

export interface ServerConfig {
  host: string;
  port: number;
}

export interface AppConfig {
  nodeEnv: string;
  logLevel: string;
  claude: ClaudeConfig;
  toolService: ToolServiceConfig;
  search: SearchConfig;
  server: ServerConfig;
}

export const DEFAULT_TOOL_SERVER_URL = 'http://localhost:5001';

export function loadConfig(source: EnvSource = process.env): AppConfig {
  return {
    nodeEnv: strEnv(source.NODE_ENV, 'development'),
    logLevel: strEnv(source.LOG_LEVEL, 'info'),

    claude: {
      apiKey: strEnv(source.CLAUDE_API_KEY),
      apiUrl: strEnv(source.CLAUDE_API_URL, 'https://api.anthropic.com/v1/messages'),
      apiVersion: '2023-06-01',
      model: strEnv(source.CLAUDE_MODEL, 'claude-3-opus-20240229'),
      maxTokens: parsePositiveInt(source.CLAUDE_MAX_TOKENS, 4096, 'CLAUDE_MAX_TOKENS'),
      timeoutMs: parsePositiveInt(source.LLM_TIMEOUT_MS, 30000, 'LLM_TIMEOUT_MS'),
    },

    // MCP_SERVER_URL is the older name for the same setting
    toolService: {
      baseUrl: trimTrailingSlash(
        strEnv(source.TOOL_SERVER_URL, strEnv(source.MCP_SERVER_URL, DEFAULT_TOOL_SERVER_URL)),
      ),
      healthTimeoutMs: parsePositiveInt(source.HEALTH_TIMEOUT_MS, 2000, 'HEALTH_TIMEOUT_MS'),
      callTimeoutMs: parsePositiveInt(source.TOOL_CALL_TIMEOUT_MS, 10000, 'TOOL_CALL_TIMEOUT_MS'),
      maxAttempts: parsePositiveInt(source.TOOL_MAX_ATTEMPTS, 3, 'TOOL_MAX_ATTEMPTS'),
      retryBaseDelayMs: parsePositiveInt(source.RETRY_BASE_DELAY_MS, 1000, 'RETRY_BASE_DELAY_MS'),
    },

    search: {
      endpoint: strEnv(source.SEARCH_ENDPOINT, 'https://api.duckduckgo.com'),
      timeoutMs: parsePositiveInt(source.SEARCH_TIMEOUT_MS, 8000, 'SEARCH_TIMEOUT_MS'),
    },

    server: {
      host: strEnv(source.HOST, '127.0.0.1'),
      port: parsePort(source.PORT, 5001),
    },
  };
}

export function isClaudeConfigured(config: AppConfig): boolean {
  return !!config.claude.apiKey;
}

// Log configuration on startup (redact secrets)
export function logConfiguration(config: AppConfig): void {
  log.info(
    {
      environment: config.nodeEnv,
      model: config.claude.model,
      claudeApiKey: isClaudeConfigured(config) ? 'configured' : 'missing',
      toolServer: config.toolService.baseUrl,
      toolMaxAttempts: config.toolService.maxAttempts,
      searchEndpoint: config.search.endpoint,
    },
    'askweb configuration',
  );
}
