import { hasActiveTwoFactor } from "../../core/entities/user.entity.js";
import { type AppError, badRequest, invalidCode } from "../../core/errors/app-error.js";
import type { Logger } from "../../core/ports/logger.js";
import type { TotpService } from "../../core/ports/totp-service.js";
import type { UserRepository } from "../../core/ports/user.repository.js";
import { userId } from "../../core/types/brand.js";
import { type Result, err, ok } from "../../core/types/result.js";
import { twoFactorCodeDto, validateInput } from "../dtos/auth.dto.js";

export interface EnrollmentResponse {
  readonly secret: string;
  readonly provisioningUri: string;
}

/**
 * Two-factor enrollment. A secret starts out pending and only gates login
 * once a code generated from it has been confirmed.
 */
export interface TwoFactorService {
  beginEnrollment(id: string): Promise<Result<EnrollmentResponse, AppError>>;
  confirmEnrollment(id: string, code: string): Promise<Result<void, AppError>>;
  disableTwoFactor(id: string, code: string): Promise<Result<void, AppError>>;
}

interface Deps {
  readonly userRepo: UserRepository;
  readonly totpService: TotpService;
  readonly issuer: string;
  readonly logger: Logger;
}

export const createTwoFactorService = (deps: Deps): TwoFactorService => {
  const { userRepo, totpService, issuer, logger } = deps;

  /** Check a code against a secret; a malformed code is simply wrong */
  const checkCode = (secret: string, code: string): Result<boolean, AppError> => {
    const input = validateInput(twoFactorCodeDto, { code });
    if (!input.ok) return ok(false);
    return totpService.verify(secret, input.value.code);
  };

  return {
    async beginEnrollment(id: string): Promise<Result<EnrollmentResponse, AppError>> {
      const found = await userRepo.findById(userId(id));
      if (!found.ok) return found;

      const user = found.value;
      if (hasActiveTwoFactor(user)) {
        return err(badRequest("Two-factor authentication is already enabled; disable it first"));
      }

      const secret = totpService.generateSecret();
      const saved = await userRepo.update(user.id, { totpSecret: secret, totpConfirmed: false });
      if (!saved.ok) return saved;

      logger.info("Two-factor enrollment started", { userId: user.id });
      return ok({ secret, provisioningUri: totpService.generateUri(secret, user.username, issuer) });
    },

    async confirmEnrollment(id: string, code: string): Promise<Result<void, AppError>> {
      const found = await userRepo.findById(userId(id));
      if (!found.ok) return found;

      const user = found.value;
      if (user.totpSecret === null || user.totpConfirmed) {
        return err(badRequest("No pending two-factor enrollment"));
      }

      const valid = checkCode(user.totpSecret, code);
      if (!valid.ok) return valid;
      if (!valid.value) {
        logger.warn("Invalid code during two-factor enrollment", { userId: user.id });
        return err(invalidCode());
      }

      const saved = await userRepo.update(user.id, { totpConfirmed: true });
      if (!saved.ok) return saved;

      logger.info("Two-factor authentication enabled", { userId: user.id });
      return ok(undefined);
    },

    async disableTwoFactor(id: string, code: string): Promise<Result<void, AppError>> {
      const found = await userRepo.findById(userId(id));
      if (!found.ok) return found;

      const user = found.value;
      if (user.totpSecret === null || !user.totpConfirmed) {
        return err(badRequest("Two-factor authentication is not enabled"));
      }

      const valid = checkCode(user.totpSecret, code);
      if (!valid.ok) return valid;
      if (!valid.value) return err(invalidCode());

      const saved = await userRepo.update(user.id, { totpSecret: null, totpConfirmed: false });
      if (!saved.ok) return saved;

      logger.info("Two-factor authentication disabled", { userId: user.id });
      return ok(undefined);
    },
  };
};
