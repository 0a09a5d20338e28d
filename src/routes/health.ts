import type { FastifyInstance } from 'fastify';
import type { ToolRegistry } from '../services/tools/index.js';

export interface HealthRouteOptions {
  registry: ToolRegistry;
}

export async function healthRoutes(server: FastifyInstance, opts: HealthRouteOptions) {
  // Liveness probe used by the dispatcher before every tool call
  server.get('/health', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      tools: opts.registry.getAll().map(t => t.name),
    };
  });
}
