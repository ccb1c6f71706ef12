/**
 * `ballot-auth create-superuser <username> <password> [email]`
 */

import type { AuthModule } from "../../bootstrap.js";
import { printKeyValue, success } from "../ui.js";

const USAGE = "Usage: ballot-auth create-superuser <username> <password> [email]";

export const createSuperuserCommand = async (
  args: readonly string[],
  module: AuthModule,
): Promise<void> => {
  const [username = "", password = "", email] = args;
  if (username === "" || password === "") throw new Error(USAGE);

  const hashed = await module.passwordHasher.hash(password);
  if (!hashed.ok) throw new Error(hashed.error.message);

  const created = await module.storage.userRepo.create({
    username,
    email: email ?? null,
    passwordHash: hashed.value,
    isSuperuser: true,
  });
  if (!created.ok) throw new Error(created.error.message);

  success(`Superuser ${username} created`);
  printKeyValue([
    ["id", created.value.id],
    ["email", created.value.email ?? "-"],
  ]);
};
