import type { AppError } from "../errors/app-error.js";
import type { Result } from "../types/result.js";

/**
 * Port: Notifier
 * Delivers an already-composed email. Composition lives in the services.
 */
export interface MailMessage {
  readonly to: string;
  readonly subject: string;
  readonly text: string;
  readonly html: string;
}

export interface Notifier {
  send(message: MailMessage): Promise<Result<void, AppError>>;
}
