import { spawn } from 'child_process';
import readline from 'readline';
import { Readable } from 'stream';
import { createChildLogger } from '../logging/logger';
import { EventSourceError } from '../../shared/errors';

const log = createChildLogger({ component: 'log-stream' });

/**
 * Yield each line of `input` without its terminator. Ends when the stream
 * ends or `signal` aborts.
 */
export async function* readLines(input: Readable, signal?: AbortSignal): AsyncGenerator<string> {
  if (signal?.aborted) return;

  const rl = readline.createInterface({ input, crlfDelay: Infinity, signal });

  try {
    for await (const line of rl) {
      yield line;
    }
  } finally {
    rl.close();
  }
}

export interface LogStreamOptions {
  predicate: string;
  command?: string;
}

/**
 * Follow the unified log through `log stream`. Each call spawns a fresh
 * process; there is no resume. Aborting `signal` kills the process and ends
 * the sequence.
 */
export async function* streamLogLines(
  options: LogStreamOptions,
  signal: AbortSignal
): AsyncGenerator<string> {
  const command = options.command ?? 'log';
  const args = ['stream', '--predicate', options.predicate, '--style', 'default', '--info'];

  const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

  // Ends the line reader on abort or spawn failure, even if stdout stays open
  const done = new AbortController();

  let spawnError: Error | undefined;
  child.once('error', (err) => {
    spawnError = err;
    done.abort();
  });

  child.stderr.setEncoding('utf8');
  child.stderr.on('data', (chunk: string) => {
    log.debug({ stderr: chunk.trim() }, 'log stream stderr');
  });

  const onAbort = () => {
    child.kill('SIGTERM');
    done.abort();
  };
  signal.addEventListener('abort', onAbort, { once: true });

  log.info({ pid: child.pid, predicate: options.predicate }, 'log stream started');

  try {
    yield* readLines(child.stdout, done.signal);
  } finally {
    signal.removeEventListener('abort', onAbort);
    if (child.exitCode === null && child.signalCode === null) {
      child.kill('SIGTERM');
    }
  }

  if (spawnError) {
    throw new EventSourceError(`failed to run ${command}: ${spawnError.message}`, spawnError);
  }

  log.info({ exitCode: child.exitCode, signal: child.signalCode }, 'log stream closed');
}
