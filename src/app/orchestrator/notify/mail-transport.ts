import { NotifyError } from "../../../core/errors.js";
import { describeCommand, runCommand, type CommandRunner } from "../../../core/process.js";

import type { MailTransport, NotificationMessage } from "./notifier.js";

// Pipes the body to a mailx-compatible command: `<command> -s <subject> <recipient>`.
export class CommandMailTransport implements MailTransport {
  constructor(
    private readonly command: string,
    private readonly run: CommandRunner = runCommand,
  ) {}

  async send(message: NotificationMessage): Promise<void> {
    const args = ["-s", message.subject, message.recipient];
    const res = await this.run(this.command, args, { input: `${message.body}\n` });

    if (res.exitCode !== 0) {
      const stderr = res.stderr.trim();
      throw new NotifyError(
        `${describeCommand(this.command, args)} exited with code ${res.exitCode}${stderr ? `: ${stderr}` : ""}`,
      );
    }
  }
}
