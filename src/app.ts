// Tool service application
// Exposes the registered tools over HTTP: GET /health and POST /tool_call

import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import { healthRoutes } from './routes/health.js';
import { toolCallRoutes } from './routes/tool-call.js';
import type { ToolRegistry } from './services/tools/index.js';

export interface ToolServerOptions {
  registry: ToolRegistry;
  logger?: FastifyServerOptions['logger'];
}

// Plugins load on ready(); listen() and inject() both wait for it
export function buildToolServer(options: ToolServerOptions): FastifyInstance {
  const server = Fastify({ logger: options.logger ?? false });

  server.register(healthRoutes, { registry: options.registry });
  server.register(toolCallRoutes, { registry: options.registry });

  return server;
}
