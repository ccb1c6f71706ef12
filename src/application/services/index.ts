export { createAuthService, type AuthService } from "./auth.service.js";
export {
  createRegistrationService,
  type RegistrationService,
  type PrivilegedRegistration,
  type SelfServiceRegistration,
} from "./registration.service.js";
export {
  createTwoFactorService,
  type TwoFactorService,
  type EnrollmentResponse,
} from "./two-factor.service.js";
export {
  createPasswordResetService,
  type PasswordResetService,
  encodeUid,
  decodeUid,
  resetMail,
} from "./password-reset.service.js";
