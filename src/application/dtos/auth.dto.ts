import { type ZodError, type ZodType, z } from "zod";
import { type AppError, validation } from "../../core/errors/app-error.js";
import { type Result, err, ok } from "../../core/types/result.js";

/** DTOs validated at the service boundary via Zod. Never trust input. */

const REQUIRED = "This field is required.";

export type FieldErrors = Record<string, string[]>;

export const loginDto = z.object({
  username: z.string().trim().min(1, REQUIRED).max(150),
  password: z.string().min(1, REQUIRED).max(128),
});

/** The code is not format-checked here: a malformed code is a wrong code */
export const verifyTwoFactorDto = z.object({
  userId: z.string().min(1, REQUIRED),
  code: z.string().trim(),
});

/** Anything but a string reads as "" */
const asText = (value: unknown): string => (typeof value === "string" ? value : "");

/**
 * Missing or non-string fields become empty strings: the caller's privilege
 * is checked before the payload, so content rules live in the service.
 */
export const registerPrivilegedDto = z.object({
  token: z.preprocess(asText, z.string()),
  username: z.preprocess(asText, z.string().trim()),
  password: z.preprocess(asText, z.string()),
});

export const emailField = z
  .string()
  .trim()
  .toLowerCase()
  .email("Enter a valid email address.")
  .max(254);

export const registerSelfServiceDto = z.object({
  email: z.string().default(""),
  password1: z.string().max(128).default(""),
  password2: z.string().max(128).default(""),
});

export const requestPasswordResetDto = z.object({
  email: emailField,
});

export const resetLinkDto = z.object({
  protocol: z.enum(["http", "https"]).default("https"),
  domain: z.string().trim().min(1, REQUIRED).max(253),
});

export const confirmPasswordResetDto = z.object({
  uidb64: z.string().min(1, REQUIRED),
  token: z.string().min(1, REQUIRED),
  password1: z.string().max(128).default(""),
  password2: z.string().max(128).default(""),
});

/** Both password fields present and equal; a mismatch is reported on password2 */
export const passwordPairErrors = (password1: string, password2: string): FieldErrors => {
  const fields: FieldErrors = {};
  if (password1 === "") fields["password1"] = [REQUIRED];
  if (password2 === "") fields["password2"] = [REQUIRED];
  if (password1 !== "" && password2 !== "" && password1 !== password2) {
    fields["password2"] = ["The two password fields didn't match."];
  }
  return fields;
};

export const twoFactorCodeDto = z.object({
  code: z.string().trim(),
});

export type LoginDto = z.input<typeof loginDto>;
export type VerifyTwoFactorDto = z.input<typeof verifyTwoFactorDto>;
export type RegisterPrivilegedDto = z.input<typeof registerPrivilegedDto>;
export type RegisterSelfServiceDto = z.input<typeof registerSelfServiceDto>;
export type RequestPasswordResetDto = z.input<typeof requestPasswordResetDto>;
export type ResetLinkDto = z.input<typeof resetLinkDto>;
export type ConfirmPasswordResetDto = z.input<typeof confirmPasswordResetDto>;

/** Group Zod issues by dotted field path */
export const fieldErrors = (error: ZodError): FieldErrors => {
  const fields: FieldErrors = {};
  for (const issue of error.issues) {
    const key = issue.path.length > 0 ? issue.path.join(".") : "_";
    const messages = fields[key] ?? [];
    messages.push(issue.message);
    fields[key] = messages;
  }
  return fields;
};

/**
 * Validate unknown input against a Zod schema.
 * Returns a typed Result with itemized VALIDATION errors; never throws.
 */
export const validateInput = <T>(
  schema: ZodType<T, z.ZodTypeDef, unknown>,
  input: unknown,
): Result<T, AppError> => {
  const result = schema.safeParse(input);
  if (!result.success) return err(validation(fieldErrors(result.error)));
  return ok(result.data);
};
