/**
 * Port: Password Policy
 * Rules applied to a new password (signup and reset; never to privileged registration):
 * - Minimum length, uppercase, lowercase, digit, special char
 * - Not entirely numeric, not a common password
 * - Not too similar to the account's username or email
 */
export interface PasswordPolicyConfig {
  readonly minLength: number;
  readonly requireUppercase: boolean;
  readonly requireLowercase: boolean;
  readonly requireDigit: boolean;
  readonly requireSpecial: boolean;
}

export interface PasswordPolicyResult {
  readonly valid: boolean;
  readonly violations: readonly string[];
}

export interface PasswordPolicy {
  /** `userAttributes` are the values the similarity rule compares against */
  validate(password: string, userAttributes?: readonly string[]): PasswordPolicyResult;
  readonly config: PasswordPolicyConfig;
}
