export { type Brand, type UserId, type Timestamp, brand, userId, timestamp } from "./brand.js";
export { type Result, type Ok, type Err, ok, err, mapErr } from "./result.js";
