export {
  loginDto,
  verifyTwoFactorDto,
  registerPrivilegedDto,
  registerSelfServiceDto,
  requestPasswordResetDto,
  resetLinkDto,
  confirmPasswordResetDto,
  twoFactorCodeDto,
  emailField,
  passwordPairErrors,
  fieldErrors,
  type FieldErrors,
  validateInput,
  type LoginDto,
  type VerifyTwoFactorDto,
  type RegisterPrivilegedDto,
  type RegisterSelfServiceDto,
  type RequestPasswordResetDto,
  type ResetLinkDto,
  type ConfirmPasswordResetDto,
} from "./auth.dto.js";
