import type { AppError } from "../../core/errors/app-error.js";
import type { Logger } from "../../core/ports/logger.js";
import type { MailMessage, Notifier } from "../../core/ports/notifier.js";
import { type Result, ok } from "../../core/types/result.js";

/**
 * Notifier for setups without a mail transport: the message is written to
 * the log so an operator can still deliver the reset link by hand.
 */
export const createLogNotifier = (logger: Logger, from: string): Notifier => {
  const log = logger.child({ component: "mail" });

  return {
    async send(message: MailMessage): Promise<Result<void, AppError>> {
      log.info(`Would send email to ${message.to}`, {
        from,
        subject: message.subject,
        text: message.text,
      });
      return ok(undefined);
    },
  };
};

/** Keeps every message in memory. Used by tests and the memory driver. */
export interface OutboxNotifier extends Notifier {
  readonly sent: readonly MailMessage[];
  clear(): void;
}

export const createOutboxNotifier = (): OutboxNotifier => {
  const sent: MailMessage[] = [];

  return {
    sent,
    async send(message: MailMessage): Promise<Result<void, AppError>> {
      sent.push(message);
      return ok(undefined);
    },
    clear() {
      sent.length = 0;
    },
  };
};
