import { execFile } from 'child_process';
import { AppleScriptError } from '../../shared/errors';

export interface ScriptRunOptions {
  signal?: AbortSignal;
  /** Kill the script after this many ms. 0 or unset means no limit. */
  timeoutMs?: number;
}

/**
 * Runs an AppleScript source with positional arguments (available to the
 * script as `argv` in its `on run argv` handler) and resolves with stdout.
 */
export type ScriptRunner = (script: string, args?: string[], options?: ScriptRunOptions) => Promise<string>;

const MAX_BUFFER = 1024 * 1024;

export const runAppleScript: ScriptRunner = (script, args = [], options = {}) =>
  new Promise((resolve, reject) => {
    execFile(
      'osascript',
      ['-e', script, ...args],
      {
        signal: options.signal,
        timeout: options.timeoutMs ?? 0,
        maxBuffer: MAX_BUFFER,
        encoding: 'utf8',
      },
      (error, stdout, stderr) => {
        if (error) {
          const reason = error.killed ? 'killed before completion' : error.message;
          reject(new AppleScriptError(reason, stderr.trim(), error));
          return;
        }
        resolve(stdout.trim());
      }
    );
  });
