// Tool service entry
// Default port 5001, localhost only

import type { FastifyInstance } from 'fastify';
import { buildToolServer } from './app.js';
import type { AppConfig } from './env.js';
import { prettyTransport } from './logger.js';
import { DuckDuckGoSearchGateway } from './services/web-search.js';
import { initializeTools } from './services/tools/index.js';

export interface RunningToolServer {
  server: FastifyInstance;
  address: string;
}

export async function startToolServer(config: AppConfig): Promise<RunningToolServer> {
  const registry = initializeTools(new DuckDuckGoSearchGateway(config.search));

  const server = buildToolServer({
    registry,
    logger: {
      level: config.logLevel,
      ...(config.nodeEnv === 'production' ? {} : { transport: prettyTransport }),
    },
  });

  const { host, port } = config.server;
  const address = await server.listen({ port, host });
  server.log.info(`Tool service listening on ${address}`);

  // The instance is thenable, so hand it back wrapped
  return { server, address };
}
