import { readFileSync } from "node:fs";
import type {
  PasswordPolicy,
  PasswordPolicyConfig,
  PasswordPolicyResult,
} from "../../core/ports/password-policy.js";

/**
 * Password policy validator.
 * Checks complexity rules, common passwords and similarity to the user's
 * own attributes.
 */

const SPECIAL_CHARS = /[!@#$%^&*()_+\-=\[\]{};':"\\|,.<>\/?]/;

/** Attribute fragments shorter than this are ignored by the similarity check */
const MIN_ATTRIBUTE_PART = 4;

const COMMON_PASSWORDS_FILE = new URL("../../../data/common-passwords.json", import.meta.url);

export const loadCommonPasswords = (file: URL = COMMON_PASSWORDS_FILE): ReadonlySet<string> => {
  const parsed: unknown = JSON.parse(readFileSync(file, "utf8"));
  if (!Array.isArray(parsed)) {
    throw new Error(`Common password list must be a JSON array: ${file.pathname}`);
  }
  return new Set(parsed.filter((p): p is string => typeof p === "string").map((p) => p.toLowerCase()));
};

const attributeParts = (value: string): string[] => {
  const lowered = value.toLowerCase();
  return [lowered, ...lowered.split(/\W+/)].filter((p) => p.length >= MIN_ATTRIBUTE_PART);
};

const isTooSimilar = (password: string, attributes: readonly string[]): boolean => {
  const lowered = password.toLowerCase();
  return attributes
    .flatMap(attributeParts)
    .some((part) => part.includes(lowered) || lowered.includes(part));
};

export const createPasswordPolicy = (
  config: PasswordPolicyConfig,
  commonPasswords: ReadonlySet<string> = new Set(),
): PasswordPolicy => ({
  config,

  validate(password: string, userAttributes: readonly string[] = []): PasswordPolicyResult {
    const violations: string[] = [];

    if (password.length < config.minLength) {
      violations.push(`Password must be at least ${config.minLength} characters`);
    }
    if (config.requireUppercase && !/[A-Z]/.test(password)) {
      violations.push("Password must contain at least one uppercase letter");
    }
    if (config.requireLowercase && !/[a-z]/.test(password)) {
      violations.push("Password must contain at least one lowercase letter");
    }
    if (config.requireDigit && !/\d/.test(password)) {
      violations.push("Password must contain at least one digit");
    }
    if (config.requireSpecial && !SPECIAL_CHARS.test(password)) {
      violations.push("Password must contain at least one special character");
    }
    if (/^\d+$/.test(password)) {
      violations.push("Password can't be entirely numeric");
    }
    if (commonPasswords.has(password.toLowerCase())) {
      violations.push("Password is too common");
    }
    if (password.length > 0 && isTooSimilar(password, userAttributes)) {
      violations.push("Password is too similar to your personal information");
    }

    return { valid: violations.length === 0, violations };
  },
});
