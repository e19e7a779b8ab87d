import { describe, it, expect } from 'vitest';
import { IMessageSender } from './sender';
import { ScriptRunner, ScriptRunOptions } from '../macos/osascript';
import { SendFailure } from '../../shared/errors';

describe('IMessageSender', () => {
  it('passes recipient and body as script arguments with the configured timeout', async () => {
    const calls: Array<{ script: string; args: string[]; options: ScriptRunOptions }> = [];
    const runner: ScriptRunner = async (script, args = [], options = {}) => {
      calls.push({ script, args, options });
      return '';
    };
    const sender = new IMessageSender({ timeoutMs: 5000 }, runner);

    await sender.send('+15551234567', 'He said "hi" & left');

    expect(calls).toHaveLength(1);
    expect(calls[0]?.args).toEqual(['+15551234567', 'He said "hi" & left']);
    expect(calls[0]?.options).toEqual({ timeoutMs: 5000 });
    expect(calls[0]?.script).not.toContain('+15551234567');
  });

  it('raises SendFailure when the script fails', async () => {
    const runner: ScriptRunner = async () => {
      throw new Error('Messages got an error: Can’t get participant');
    };
    const sender = new IMessageSender({ timeoutMs: 0 }, runner);

    const error = await sender.send('+15551234567', 'Hi').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SendFailure);
    if (error instanceof SendFailure) {
      expect(error.recipient).toBe('+15551234567');
      expect(error.message).toBe(
        'Messages error: Failed to send message: Messages got an error: Can’t get participant'
      );
    }
  });
});
