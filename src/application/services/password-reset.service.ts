import type { User } from "../../core/entities/user.entity.js";
import {
  type AppError,
  ErrorCode,
  badRequest,
  validation,
} from "../../core/errors/app-error.js";
import type { Logger } from "../../core/ports/logger.js";
import type { MailMessage, Notifier } from "../../core/ports/notifier.js";
import type { PasswordHasher } from "../../core/ports/password-hasher.js";
import type { PasswordPolicy } from "../../core/ports/password-policy.js";
import type { ResetTokenGenerator } from "../../core/ports/reset-token.js";
import type { TokenStore } from "../../core/ports/token-store.js";
import type { UserRepository } from "../../core/ports/user.repository.js";
import { userId } from "../../core/types/brand.js";
import { type Result, err, mapErr, ok } from "../../core/types/result.js";
import { escapeHtml } from "../../shared/utils/html.js";
import {
  type ConfirmPasswordResetDto,
  type RequestPasswordResetDto,
  type ResetLinkDto,
  confirmPasswordResetDto,
  passwordPairErrors,
  requestPasswordResetDto,
  resetLinkDto,
  validateInput,
} from "../dtos/auth.dto.js";

export interface PasswordResetService {
  /** Mail a reset link. Unknown addresses succeed without sending anything. */
  requestPasswordReset(
    dto: RequestPasswordResetDto,
    link: ResetLinkDto,
  ): Promise<Result<void, AppError>>;
  /** Set a new password from a reset link and revoke every session of the user */
  confirmPasswordReset(dto: ConfirmPasswordResetDto): Promise<Result<void, AppError>>;
}

interface Deps {
  readonly userRepo: UserRepository;
  readonly tokenStore: TokenStore;
  readonly passwordHasher: PasswordHasher;
  readonly passwordPolicy: PasswordPolicy;
  readonly resetTokens: ResetTokenGenerator;
  readonly notifier: Notifier;
  readonly logger: Logger;
}

export const encodeUid = (id: string): string => Buffer.from(id, "utf8").toString("base64url");

export const decodeUid = (uidb64: string): string =>
  Buffer.from(uidb64, "base64url").toString("utf8");

interface ResetMailContext {
  readonly email: string;
  readonly username: string;
  readonly domain: string;
  readonly resetLink: string;
}

/** Compose the reset email. The wording is what users of the platform already receive. */
export const resetMail = (ctx: ResetMailContext): Omit<MailMessage, "to"> => {
  const intro = `Alguien solicitó restablecer la contraseña del correo electrónico ${ctx.email}.`;
  const action = "Haz click en el siguiente link:";
  const reminder = `Tu nombre de usuario, en caso de que lo hayas olvidado: ${ctx.username}`;

  const link = escapeHtml(ctx.resetLink);
  return {
    subject: `Password reset on ${ctx.domain}`,
    text: [intro, action, ctx.resetLink, reminder].join("\n"),
    html: [
      `<p>${escapeHtml(intro)}</p>`,
      `<p>${escapeHtml(action)}<br><a href="${link}">${link}</a></p>`,
      `<p>${escapeHtml(reminder)}</p>`,
    ].join("\n"),
  };
};

const INVALID_LINK = "The password reset link is invalid or has expired";

export const createPasswordResetService = (deps: Deps): PasswordResetService => {
  const { userRepo, tokenStore, passwordHasher, passwordPolicy, resetTokens, notifier, logger } =
    deps;

  /** Resolve the uid of a reset link; a miss of any kind is an invalid link */
  const findLinkOwner = async (uidb64: string): Promise<Result<User, AppError>> => {
    const id = decodeUid(uidb64);
    if (id === "") return err(badRequest(INVALID_LINK));

    return mapErr(await userRepo.findById(userId(id)), (e) =>
      e.code === ErrorCode.NOT_FOUND ? badRequest(INVALID_LINK) : e,
    );
  };

  return {
    async requestPasswordReset(
      dto: RequestPasswordResetDto,
      link: ResetLinkDto,
    ): Promise<Result<void, AppError>> {
      const input = validateInput(requestPasswordResetDto, dto);
      if (!input.ok) return input;
      const site = validateInput(resetLinkDto, link);
      if (!site.ok) return site;

      const found = await userRepo.findByEmail(input.value.email);
      if (!found.ok) {
        if (found.error.code !== ErrorCode.NOT_FOUND) return found;
        logger.debug("Password reset for unknown email", { email: input.value.email });
        return ok(undefined);
      }

      const user = found.value;
      const email = user.email ?? input.value.email;
      const { protocol, domain } = site.value;
      const resetLink = `${protocol}://${domain}/authentication/reset/${encodeUid(user.id)}/${resetTokens.make(user)}/`;

      const sent = await notifier.send({
        to: email,
        ...resetMail({ email, username: user.username, domain, resetLink }),
      });
      if (!sent.ok) {
        logger.error("Password reset email failed", { userId: user.id, code: sent.error.code });
        return sent;
      }

      logger.info("Password reset email sent", { userId: user.id });
      return ok(undefined);
    },

    async confirmPasswordReset(dto: ConfirmPasswordResetDto): Promise<Result<void, AppError>> {
      const input = validateInput(confirmPasswordResetDto, dto);
      if (!input.ok) return input;
      const { uidb64, token, password1, password2 } = input.value;

      const owner = await findLinkOwner(uidb64);
      if (!owner.ok) return owner;
      const user = owner.value;

      if (!resetTokens.check(user, token)) {
        logger.warn("Rejected password reset token", { userId: user.id });
        return err(badRequest(INVALID_LINK));
      }

      const fields = passwordPairErrors(password1, password2);
      if (password1 !== "") {
        const attributes = user.email !== null ? [user.username, user.email] : [user.username];
        const policy = passwordPolicy.validate(password1, attributes);
        if (policy.violations.length > 0) {
          fields["password1"] = [...(fields["password1"] ?? []), ...policy.violations];
        }
      }
      if (Object.keys(fields).length > 0) return err(validation(fields));

      const hashed = await passwordHasher.hash(password1);
      if (!hashed.ok) return hashed;

      const updated = await userRepo.update(user.id, { passwordHash: hashed.value });
      if (!updated.ok) return updated;

      const revoked = await tokenStore.deleteAllForUser(user.id);
      if (!revoked.ok) return revoked;

      logger.info("Password reset completed", { userId: user.id, revokedTokens: revoked.value });
      return ok(undefined);
    },
  };
};
