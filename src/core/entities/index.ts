export { type User, type UserView, toUserView, hasActiveTwoFactor } from "./user.entity.js";
export type { Token } from "./token.entity.js";
export type { LoginStep, AuthenticatedStep, AwaitingCodeStep } from "./login-step.js";
