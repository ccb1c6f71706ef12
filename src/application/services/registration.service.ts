import { type UserView, toUserView } from "../../core/entities/user.entity.js";
import {
  type AppError,
  ErrorCode,
  badRequest,
  notFound,
  unauthorized,
  validation,
} from "../../core/errors/app-error.js";
import type { Logger } from "../../core/ports/logger.js";
import type { PasswordHasher } from "../../core/ports/password-hasher.js";
import type { PasswordPolicy } from "../../core/ports/password-policy.js";
import type { TokenStore } from "../../core/ports/token-store.js";
import type { UserRepository } from "../../core/ports/user.repository.js";
import type { UserId } from "../../core/types/brand.js";
import { type Result, err, mapErr, ok } from "../../core/types/result.js";
import {
  type FieldErrors,
  type RegisterPrivilegedDto,
  type RegisterSelfServiceDto,
  emailField,
  fieldErrors,
  passwordPairErrors,
  registerPrivilegedDto,
  registerSelfServiceDto,
} from "../dtos/auth.dto.js";

export interface PrivilegedRegistration {
  readonly userPk: UserId;
  readonly token: string;
}

export interface SelfServiceRegistration {
  readonly user: UserView;
  readonly token: string;
}

export interface RegistrationService {
  /** Create an account on behalf of a superuser identified by their token */
  registerPrivileged(dto: RegisterPrivilegedDto): Promise<Result<PrivilegedRegistration, AppError>>;
  /** Email signup; the new user is logged in straight away */
  registerSelfService(
    dto: RegisterSelfServiceDto,
  ): Promise<Result<SelfServiceRegistration, AppError>>;
}

interface Deps {
  readonly userRepo: UserRepository;
  readonly tokenStore: TokenStore;
  readonly passwordHasher: PasswordHasher;
  readonly passwordPolicy: PasswordPolicy;
  readonly logger: Logger;
}

const MAX_USERNAME_LENGTH = 150;
const MAX_PASSWORD_LENGTH = 128;
const DUPLICATE_EMAIL = "A user is already registered with this e-mail address.";

const addError = (fields: FieldErrors, field: string, message: string): void => {
  fields[field] = [...(fields[field] ?? []), message];
};

export const createRegistrationService = (deps: Deps): RegistrationService => {
  const { userRepo, tokenStore, passwordHasher, passwordPolicy, logger } = deps;

  /** Resolve a token to its owner and require superuser rights */
  const requireSuperuser = async (token: string): Promise<Result<UserId, AppError>> => {
    const found = await tokenStore.find(token);
    if (!found.ok) return found;
    if (found.value === null) return err(notFound("Token"));

    const owner = await userRepo.findById(found.value.userId);
    if (!owner.ok) return owner;
    if (!owner.value.isSuperuser) {
      logger.warn("Registration refused: caller is not a superuser", { userId: owner.value.id });
      return err(unauthorized("Only superusers can register users"));
    }
    return ok(owner.value.id);
  };

  return {
    async registerPrivileged(
      dto: RegisterPrivilegedDto,
    ): Promise<Result<PrivilegedRegistration, AppError>> {
      const parsed = registerPrivilegedDto.safeParse(dto);
      if (!parsed.success) {
        return err(badRequest("Malformed registration", { fields: fieldErrors(parsed.error) }));
      }
      const { token, username, password } = parsed.data;

      const caller = await requireSuperuser(token);
      if (!caller.ok) return caller;

      if (username === "" || password === "") {
        return err(badRequest("Username and password are required"));
      }
      if (username.length > MAX_USERNAME_LENGTH || password.length > MAX_PASSWORD_LENGTH) {
        return err(badRequest("Username or password is too long"));
      }

      const hashed = await passwordHasher.hash(password);
      if (!hashed.ok) return hashed;

      const created = mapErr(
        await userRepo.create({ username, passwordHash: hashed.value }),
        (e) =>
          e.code === ErrorCode.CONFLICT ? badRequest("A user with that username already exists") : e,
      );
      if (!created.ok) return created;

      const minted = await tokenStore.create(created.value.id);
      if (!minted.ok) return minted;

      logger.info("User registered by superuser", {
        userId: created.value.id,
        registeredBy: caller.value,
      });
      return ok({ userPk: created.value.id, token: minted.value.key });
    },

    async registerSelfService(
      dto: RegisterSelfServiceDto,
    ): Promise<Result<SelfServiceRegistration, AppError>> {
      const parsed = registerSelfServiceDto.safeParse(dto);
      if (!parsed.success) return err(validation(fieldErrors(parsed.error)));

      const { password1, password2 } = parsed.data;
      const fields = passwordPairErrors(password1, password2);

      const email = emailField.safeParse(parsed.data.email);
      if (!email.success) {
        for (const issue of email.error.issues) addError(fields, "email", issue.message);
      } else {
        const existing = await userRepo.findByEmail(email.data);
        if (existing.ok) {
          addError(fields, "email", DUPLICATE_EMAIL);
        } else if (existing.error.code !== ErrorCode.NOT_FOUND) {
          return existing;
        }
      }

      if (password1 !== "") {
        const attributes = email.success ? [email.data] : [];
        const policy = passwordPolicy.validate(password1, attributes);
        for (const violation of policy.violations) addError(fields, "password1", violation);
      }

      if (!email.success || Object.keys(fields).length > 0) {
        logger.info("Self-service registration rejected", { fields: Object.keys(fields) });
        return err(validation(fields));
      }

      const hashed = await passwordHasher.hash(password1);
      if (!hashed.ok) return hashed;

      // CONFLICT here means a concurrent signup for the same address won
      const created = mapErr(
        await userRepo.create({ username: email.data, email: email.data, passwordHash: hashed.value }),
        (e) => (e.code === ErrorCode.CONFLICT ? validation({ email: [DUPLICATE_EMAIL] }) : e),
      );
      if (!created.ok) return created;

      const minted = await tokenStore.create(created.value.id);
      if (!minted.ok) return minted;

      logger.info("User signed up", { userId: created.value.id });
      return ok({ user: toUserView(created.value), token: minted.value.key });
    },
  };
};
