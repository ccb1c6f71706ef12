export { createInMemoryUserRepository } from "./in-memory-user.repository.js";
export { createInMemoryTokenStore } from "./in-memory-token.store.js";
export { createInMemoryFailedAttemptCounter } from "./in-memory-failed-attempt.counter.js";
export { createInMemoryTwoFactorChallengeStore } from "./in-memory-two-factor-challenge.store.js";
export { createSqliteUserRepository } from "./sqlite-user.repository.js";
export { createSqliteTokenStore } from "./sqlite-token.store.js";
export { createSqliteFailedAttemptCounter } from "./sqlite-failed-attempt.counter.js";
export { openSqliteDatabase } from "./sqlite-connection.js";
export { migrateUp, migrateDown } from "./migrations/runner.js";
