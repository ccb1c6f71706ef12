import { randomBytes, randomUUID } from "node:crypto";

/** Random identifier for new records (UUIDv4). */
export const generateId = (): string => randomUUID();

/** Opaque bearer token key: 20 random bytes as 40 lowercase hex chars. */
export const generateTokenKey = (): string => randomBytes(20).toString("hex");
