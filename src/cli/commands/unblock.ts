/**
 * `ballot-auth unblock <username>`: the only way out of a lockout.
 */

import type { AuthModule } from "../../bootstrap.js";
import { info, success } from "../ui.js";

export const unblockCommand = async (
  args: readonly string[],
  module: AuthModule,
): Promise<void> => {
  const username = args[0] ?? "";
  if (username === "") throw new Error("Usage: ballot-auth unblock <username>");

  const { userRepo, failedAttempts } = module.storage;

  const found = await userRepo.findByUsername(username);
  if (!found.ok) throw new Error(found.error.message);

  const reset = await failedAttempts.reset(found.value.id);
  if (!reset.ok) throw new Error(reset.error.message);

  if (!found.value.isBlocked) {
    info(`${username} is not blocked; failed-login count cleared`);
    return;
  }

  const updated = await userRepo.update(found.value.id, { isBlocked: false });
  if (!updated.ok) throw new Error(updated.error.message);

  success(`${username} unblocked`);
};
