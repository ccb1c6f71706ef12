export { createPasswordHasher } from "./password-hasher.js";
export { createPasswordPolicy, loadCommonPasswords } from "./password-policy.js";
export { createAccountLockout } from "./account-lockout.js";
export { createTotpService, base32Encode, base32Decode } from "./totp-service.js";
export { createResetTokenGenerator } from "./reset-token.js";
