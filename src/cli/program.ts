/**
 * Command-line program
 * `askweb [query...]` asks Claude with web search; `askweb serve` runs the tool service
 */

import { Command } from 'commander';
import { loadConfig, logConfiguration, type AppConfig } from '../env.js';
import { startToolServer } from '../server.js';
import { runAsk, type AskIo } from './ask.js';
import { createConsoleIo } from './console-io.js';

type EnvSource = Record<string, string | undefined>;

export interface ProgramDeps {
  env?: EnvSource;
  io?: AskIo;
  ask?: typeof runAsk;
  serve?: (config: AppConfig) => Promise<void>;
  setExitCode?: (code: number) => void;
}

// Flags override the matching environment variables and go through the same validation
export function envWith(source: EnvSource, overrides: Record<string, string | undefined>): EnvSource {
  const env: EnvSource = { ...source };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) env[key] = value;
  }
  return env;
}

async function serveUntilStopped(config: AppConfig): Promise<void> {
  const { server } = await startToolServer(config);
  const shutdown = () => {
    server.close().catch(err => {
      server.log.error(err);
      process.exitCode = 1;
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

export function buildProgram(deps: ProgramDeps = {}): Command {
  const env = deps.env ?? process.env;
  const ask = deps.ask ?? runAsk;
  const serve = deps.serve ?? serveUntilStopped;
  const setExitCode =
    deps.setExitCode ??
    ((code: number) => {
      process.exitCode = code;
    });

  const program = new Command();

  program
    .name('askweb')
    .description('Ask Claude questions with web search capability')
    .version('1.0.0')
    .argument('[query...]', 'the question to ask Claude')
    .option('-m, --model <id>', 'Claude model to use')
    .option('-t, --tool-server <url>', 'base URL of the tool service')
    .option('-s, --sources', 'print the web results the answer was built from')
    .action(async (query: string[], opts: { model?: string; toolServer?: string; sources?: boolean }) => {
      const config = loadConfig(envWith(env, { CLAUDE_MODEL: opts.model, TOOL_SERVER_URL: opts.toolServer }));
      logConfiguration(config);

      const controller = new AbortController();
      const onSigint = () => controller.abort();
      process.once('SIGINT', onSigint);

      try {
        setExitCode(
          await ask(config, deps.io ?? createConsoleIo(), {
            query,
            showSources: opts.sources,
            signal: controller.signal,
          }),
        );
      } finally {
        process.off('SIGINT', onSigint);
      }
    });

  // `askweb serve me a pasta recipe` is a usage error, not a server start
  program
    .command('serve')
    .description('Run the tool service that executes web searches')
    .option('-H, --host <host>', 'interface to bind')
    .option('-p, --port <port>', 'port to listen on')
    .allowExcessArguments(false)
    .action(async (opts: { host?: string; port?: string }) => {
      const config = loadConfig(envWith(env, { HOST: opts.host, PORT: opts.port }));
      logConfiguration(config);
      await serve(config);
    });

  return program;
}
