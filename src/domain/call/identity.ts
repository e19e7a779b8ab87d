import { createHash } from 'crypto';

export interface IdentityRule {
  name: string;
  pattern: RegExp;
  /** Lower-case the capture (UUIDs appear in both cases in the log). */
  lowercase?: boolean;
}

export interface CallIdentity {
  callId: string;
  rule: string;
}

export const FALLBACK_RULE = 'fallback';
export const FALLBACK_PREFIX = 'line:';

const UUID = '[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}';
const TOKEN = '[A-Za-z0-9][\\w.-]*';

/**
 * Priority order matters: labelled identifiers beat a bare UUID, and a bare
 * UUID beats a generic `id:` field.
 */
export const DEFAULT_IDENTITY_RULES: readonly IdentityRule[] = [
  { name: 'labeled-uuid', pattern: new RegExp(`(?:call[-_ ]?)?uuid\\s*[:=]\\s*(${UUID})`, 'i'), lowercase: true },
  { name: 'call-id', pattern: new RegExp(`call[-_ ]?id\\s*[:=]\\s*(${TOKEN})`, 'i') },
  { name: 'session-id', pattern: new RegExp(`session[-_ ]?id\\s*[:=]\\s*(${TOKEN})`, 'i') },
  { name: 'uuid', pattern: new RegExp(`\\b(${UUID})\\b`, 'i'), lowercase: true },
  { name: 'id', pattern: new RegExp(`\\bid\\s*[:=]\\s*(${TOKEN})`, 'i') },
];

/**
 * Case-insensitive keyword check used to pick qualifying log lines.
 */
export function isQualifyingLine(line: string, keyword: string): boolean {
  return line.toLowerCase().includes(keyword.toLowerCase());
}

export function fallbackCallId(line: string): string {
  return FALLBACK_PREFIX + createHash('sha256').update(line, 'utf8').digest('hex');
}

export class CallIdentityExtractor {
  constructor(private readonly rules: readonly IdentityRule[] = DEFAULT_IDENTITY_RULES) {}

  extract(line: string): CallIdentity {
    for (const rule of this.rules) {
      const match = rule.pattern.exec(line);
      const captured = match?.[1];
      if (!captured) continue;

      const callId = rule.lowercase ? captured.toLowerCase() : captured.replace(/\.+$/, '');
      if (callId.length === 0) continue;

      return { callId, rule: rule.name };
    }

    return { callId: fallbackCallId(line), rule: FALLBACK_RULE };
  }
}
