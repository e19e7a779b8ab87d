import { Logger } from 'pino';
import { runAppleScript, ScriptRunner } from '../macos/osascript';
import { createChildLogger } from '../../infra/logging/logger';
import { SendFailure, toError } from '../../shared/errors';
import { MessageSender } from '../../shared/types';

// argv: [recipient, body]
const SEND_SCRIPT = `
on run argv
  set targetHandle to item 1 of argv
  set messageBody to item 2 of argv
  tell application "Messages"
    set targetService to 1st account whose service type = iMessage
    set targetBuddy to participant targetHandle of targetService
    send messageBody to targetBuddy
  end tell
end run
`;

export interface IMessageSenderOptions {
  /** 0 disables the deadline. */
  timeoutMs: number;
  logger?: Logger;
}

/**
 * Sends texts through Messages.app. Recipient and body are passed as script
 * arguments, never spliced into the script source.
 */
export class IMessageSender implements MessageSender {
  private readonly log: Logger;

  constructor(
    private readonly options: IMessageSenderOptions,
    private readonly run: ScriptRunner = runAppleScript
  ) {
    this.log = options.logger ?? createChildLogger({ component: 'imessage-sender' });
  }

  async send(recipient: string, body: string): Promise<void> {
    try {
      await this.run(SEND_SCRIPT, [recipient, body], { timeoutMs: this.options.timeoutMs });
      this.log.debug({ to: recipient, contentLength: body.length }, 'Message handed to Messages');
    } catch (error) {
      const err = toError(error);
      throw new SendFailure(recipient, `Failed to send message: ${err.message}`, err);
    }
  }
}
