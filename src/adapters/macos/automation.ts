import { runAppleScript, ScriptRunner } from './osascript';
import { AutomationFailure, toError } from '../../shared/errors';
import { CallAutomation } from '../../domain/call/orchestrator';

// argv: [buttonLabel]. Prints "declined" when a button was clicked.
const DECLINE_SCRIPT = `
on run argv
  set buttonLabel to item 1 of argv
  tell application "System Events"
    if not (exists process "NotificationCenter") then return "not-found"
    tell process "NotificationCenter"
      repeat with w in windows
        repeat with el in (entire contents of w)
          try
            if (role of el is "AXButton") and (name of el is buttonLabel) then
              click el
              return "declined"
            end if
          end try
        end repeat
      end repeat
    end tell
  end tell
  return "not-found"
end run
`;

// argv: [appName, ...processesToKill]
const RESTART_SCRIPT = `
on run argv
  set appName to item 1 of argv
  tell application appName
    if it is running then quit
  end tell
  delay 1
  repeat with i from 2 to count of argv
    do shell script "killall " & quoted form of (item i of argv) & " 2>/dev/null || true"
  end repeat
  return "restarted"
end run
`;

export interface MacAutomationOptions {
  declineButtonLabel: string;
  appName: string;
  killProcesses: string[];
}

/**
 * Drives the call UI through osascript: clicks the Decline button on the
 * incoming-call notification, and quits the call app plus its helpers so
 * they come back clean.
 */
export class MacAutomation implements CallAutomation {
  constructor(
    private readonly options: MacAutomationOptions,
    private readonly run: ScriptRunner = runAppleScript
  ) {}

  async declineCall(signal?: AbortSignal): Promise<void> {
    const output = await this.exec('decline-call', DECLINE_SCRIPT, [this.options.declineButtonLabel], signal);

    if (output !== 'declined') {
      throw new AutomationFailure('decline-call', 'no matching call notification found');
    }
  }

  async restartApp(signal?: AbortSignal): Promise<void> {
    await this.exec('restart-app', RESTART_SCRIPT, [this.options.appName, ...this.options.killProcesses], signal);
  }

  private async exec(action: string, script: string, args: string[], signal?: AbortSignal): Promise<string> {
    try {
      return await this.run(script, args, { signal });
    } catch (error) {
      const err = toError(error);
      throw new AutomationFailure(action, err.message, { cause: err });
    }
  }
}
