// ============================================================================
// Outbound Messages
// ============================================================================

export interface OutboundMessage {
  readonly recipient: string;
  readonly body: string;
  readonly enqueuedAt: number;
}

/**
 * Anything that can hand a text to the messaging channel. Implementations
 * throw on failure; the delivery worker treats every throw the same way.
 */
export interface MessageSender {
  send(recipient: string, body: string): Promise<void>;
}

export interface DeliveryStats {
  running: boolean;
  delivered: number;
  failed: number;
  pending: number;
}

// ============================================================================
// Call Events
// ============================================================================

export interface CallEvent {
  line: string;
  callId: string;
  rule: string;
  observedAt: number;
}

export type LineOutcome = 'ignored' | 'suppressed' | 'triggered';

export interface ActionOutcome {
  action: string;
  status: 'completed' | 'failed';
  durationMs: number;
  error?: string;
}

export interface WatcherStats {
  running: boolean;
  restarts: number;
  linesRead: number;
  triggered: number;
  suppressed: number;
  trackedCalls: number;
}

/**
 * Produces a fresh line stream each time it is called. Aborting the signal
 * must end the stream.
 */
export type LineSourceFactory = (signal: AbortSignal) => AsyncIterable<string>;

// ============================================================================
// Inbound Messages
// ============================================================================

export interface InboundMessage {
  rowId: number;
  text: string | null;
  isFromMe: boolean;
  handle: string | null;
  uncanonicalizedId: string | null;
  chatIdentifier: string | null;
}

export interface ForwardPayload {
  From: string;
  To: string;
  Body: string;
}
