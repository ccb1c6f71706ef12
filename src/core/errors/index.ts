export {
  type AppError,
  ErrorCode,
  httpStatus,
  appError,
  invalidCredentials,
  accountLocked,
  invalidCode,
  badRequest,
  unauthorized,
  notFound,
  conflict,
  validation,
  internal,
  storageUnavailable,
} from "./app-error.js";
