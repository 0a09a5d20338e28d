/**
 * Tool Call Route
 * Executes one named tool and returns its result as `{results}` or `{error}`
 */

import type { FastifyInstance } from 'fastify';
import { ToolInvocationSchema, type ToolRegistry } from '../services/tools/index.js';
import { AppError, formatErrorResponse, toAppError } from '../utils/errors.js';

export interface ToolCallRouteOptions {
  registry: ToolRegistry;
}

export async function toolCallRoutes(server: FastifyInstance, opts: ToolCallRouteOptions) {
  server.post('/tool_call', async (request, reply) => {
    const parsed = ToolInvocationSchema.safeParse(request.body);
    if (!parsed.success) {
      const error = AppError.badRequest(
        parsed.error.issues.map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; '),
      );
      return reply.code(error.statusCode).send(formatErrorResponse(error));
    }

    const { name, parameters } = parsed.data;
    const tool = opts.registry.get(name);
    if (!tool) {
      const error = AppError.notFound(`unknown tool "${name}"`);
      return reply.code(error.statusCode).send(formatErrorResponse(error));
    }

    try {
      const result = await tool.execute(parameters);
      request.log.info({ tool: name, ok: !('error' in result) }, 'Tool call completed');
      return result;
    } catch (err) {
      const error = toAppError(err);
      request.log.error({ tool: name, err }, 'Tool call failed');
      return reply.code(500).send(formatErrorResponse(error));
    }
  });
}
