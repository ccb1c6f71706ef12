import { timingSafeEqual as cryptoTimingSafeEqual } from "node:crypto";

/**
 * Constant-time string comparison for one-time codes and token digests.
 * Length is not secret here (codes and digests have a fixed width).
 */
export const timingSafeEqual = (a: string, b: string): boolean => {
  const bufA = Buffer.from(a, "utf8");
  const bufB = Buffer.from(b, "utf8");
  if (bufA.byteLength !== bufB.byteLength) return false;
  return cryptoTimingSafeEqual(bufA, bufB);
};
