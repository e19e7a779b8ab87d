import { describe, it, expect } from 'vitest';
import { sendRequestSchema, outboundMessageSchema, toFieldErrors, codePointLength } from './validation';

describe('sendRequestSchema', () => {
  it('trims recipient and message', () => {
    expect(sendRequestSchema.parse({ to: ' +15551234567 ', message: ' Hi ' })).toEqual({
      to: '+15551234567',
      message: 'Hi',
    });
  });

  it('measures length after trimming', () => {
    const padded = `  ${'x'.repeat(10000)}  `;

    expect(sendRequestSchema.safeParse({ to: '+15551234567', message: padded }).success).toBe(true);
  });

  it('counts the message limit in code points', () => {
    const atLimit = '😀'.repeat(10000);
    const overLimit = '😀'.repeat(10001);

    expect(sendRequestSchema.safeParse({ to: '+15551234567', message: atLimit }).success).toBe(true);

    const result = sendRequestSchema.safeParse({ to: '+15551234567', message: overLimit });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(toFieldErrors(result.error)).toEqual({ message: ['Message must be at most 10000 characters'] });
    }
  });

  it('rejects missing fields', () => {
    const result = sendRequestSchema.safeParse({ to: '+15551234567' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(Object.keys(toFieldErrors(result.error))).toEqual(['message']);
    }
  });
});

describe('outboundMessageSchema', () => {
  it('accepts bodies up to 10000 code points', () => {
    expect(outboundMessageSchema.safeParse({ recipient: 'a', body: '😀'.repeat(10000) }).success).toBe(true);
    expect(outboundMessageSchema.safeParse({ recipient: 'a', body: '😀'.repeat(10001) }).success).toBe(false);
  });

  it('does not trim', () => {
    expect(outboundMessageSchema.parse({ recipient: ' a ', body: ' b ' })).toEqual({ recipient: ' a ', body: ' b ' });
  });
});

describe('toFieldErrors', () => {
  it('groups messages per field and files pathless issues under _root', () => {
    const fieldResult = outboundMessageSchema.safeParse({ recipient: '', body: '' });
    const rootResult = outboundMessageSchema.safeParse('not an object');

    expect(fieldResult.success).toBe(false);
    expect(rootResult.success).toBe(false);
    if (!fieldResult.success && !rootResult.success) {
      expect(toFieldErrors(fieldResult.error)).toEqual({
        recipient: ['Recipient is required'],
        body: ['Message body is required'],
      });
      expect(Object.keys(toFieldErrors(rootResult.error))).toEqual(['_root']);
    }
  });
});

describe('codePointLength', () => {
  it('counts a surrogate pair once', () => {
    expect(codePointLength('a😀b')).toBe(3);
    expect('a😀b'.length).toBe(4);
  });
});
