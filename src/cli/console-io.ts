/**
 * Terminal IO for the ask command
 * Answers and error lines go through console; the prompt reads one line from `input`
 */

import { createInterface } from 'node:readline/promises';
import { AppError, isAbortError } from '../utils/errors.js';
import type { AskIo } from './ask.js';

export interface ConsoleStreams {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

export function createConsoleIo(streams: ConsoleStreams = {}): AskIo {
  const input = streams.input ?? process.stdin;
  const output = streams.output ?? process.stdout;

  return {
    stdout: line => console.log(line),
    stderr: line => console.error(line),
    async prompt(question, signal) {
      const rl = createInterface({ input, output });
      try {
        // rl.question() never settles once the interface closes (EOF, Ctrl-D), so race it
        return await new Promise<string>((resolve, reject) => {
          rl.once('close', () => resolve(''));
          rl.once('SIGINT', () => reject(AppError.cancelled('Prompt cancelled')));
          rl.question(question, { signal }).then(resolve, (err: unknown) => {
            reject(isAbortError(err) ? AppError.cancelled('Prompt cancelled') : err);
          });
        });
      } finally {
        rl.close();
      }
    },
  };
}
