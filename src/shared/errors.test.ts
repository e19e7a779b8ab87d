import { describe, it, expect } from 'vitest';
import {
  AppError,
  AutomationFailure,
  InvalidMessageError,
  ValidationError,
  withTimeout,
} from './errors';

describe('error classes', () => {
  it('keeps instanceof working through the hierarchy', () => {
    const error = new InvalidMessageError({ body: ['Message body is required'] });

    expect(error).toBeInstanceOf(InvalidMessageError);
    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toBeInstanceOf(AppError);
    expect(error.name).toBe('InvalidMessageError');
    expect(error.message).toBe('body: Message body is required');
  });

  it('prefixes automation failures with the action', () => {
    const error = new AutomationFailure('restart-app', 'timed out after 10ms', { timedOut: true });

    expect(error.message).toBe('Automation error: restart-app: timed out after 10ms');
    expect(error.timedOut).toBe(true);
    expect(error.statusCode).toBe(502);
  });
});

describe('withTimeout', () => {
  it('resolves with the result when work finishes in time', async () => {
    await expect(withTimeout(async () => 'done', 100, () => new Error('late'))).resolves.toBe('done');
  });

  it('rejects with the timeout error and aborts the signal', async () => {
    let seenSignal: AbortSignal | undefined;

    const result = withTimeout(
      (signal) => {
        seenSignal = signal;
        return new Promise<string>(() => undefined);
      },
      10,
      () => new Error('late')
    );

    await expect(result).rejects.toThrow('late');
    expect(seenSignal?.aborted).toBe(true);
  });

  it('passes through errors from the work itself', async () => {
    await expect(
      withTimeout(async () => {
        throw new Error('broken');
      }, 100, () => new Error('late'))
    ).rejects.toThrow('broken');
  });
});
