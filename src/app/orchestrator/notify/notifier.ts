/**
 * Notifier composes and delivers the operator status message for a finished batch.
 * Purpose: a short OK/NG signal; details stay in the event log.
 * Assumptions: delivery is best-effort and must never change the batch exit code.
 * Usage: await notifier.notify(recipient, batchResult)
 */

import { formatErrorMessage } from "../../../core/error-format.js";
import { logBatchEvent, type BatchEventLogger } from "../../../core/logger.js";
import type { BatchResult, BatchStatus } from "../run/batch-result.js";

// =============================================================================
// TYPES
// =============================================================================

export type NotificationMessage = Readonly<{
  recipient: string;
  subject: string;
  body: string;
  timestamp: string;
}>;

export type MailTransport = {
  send(message: NotificationMessage): Promise<void>;
};

export type NotifierOptions = {
  transport: MailTransport;
  productName: string;
  logger: BatchEventLogger;
};

// =============================================================================
// COMPOSITION
// =============================================================================

export function statusToken(status: BatchStatus): "OK" | "NG" {
  return status === "success" ? "OK" : "NG";
}

export function composeNotification(
  recipient: string,
  result: BatchResult,
  productName: string,
): NotificationMessage {
  return Object.freeze({
    recipient,
    subject: `[${productName}] ${statusToken(result.status)} ${result.completedAt}`,
    body: composeBody(result),
    timestamp: result.completedAt,
  });
}

function composeBody(result: BatchResult): string {
  if (result.status === "success") {
    return `status=success units=${result.unitsRun}`;
  }
  if (result.failure) {
    return `status=failure unit=${result.failure.unit.id} exit_code=${result.failure.exitCode}`;
  }
  return `status=failure error=${result.error ?? "unknown"}`;
}

// =============================================================================
// NOTIFIER
// =============================================================================

export class Notifier {
  constructor(private readonly options: NotifierOptions) {}

  async notify(recipient: string, result: BatchResult): Promise<boolean> {
    const message = composeNotification(recipient, result, this.options.productName);

    try {
      await this.options.transport.send(message);
    } catch (err) {
      const detail = formatErrorMessage(err);
      logBatchEvent(this.options.logger, "notify.failed", { recipient, message: detail });
      console.warn(`Warning: failed to send status mail to ${recipient}: ${detail}`);
      return false;
    }

    logBatchEvent(this.options.logger, "notify.sent", { recipient, subject: message.subject });
    return true;
  }
}
