import type { Session } from "../config/db.js";
import { NotFoundError } from "../utils/errors.js";
import { parseRow } from "../models/rows.js";
import { UserRowSchema, type UserId } from "../models/User.js";

/** Accounts live elsewhere; all the core needs is proof the author exists. */
export const requireUser = async (session: Session, userId: UserId): Promise<void> => {
  const [row] = await session.rows(
    "SELECT user_id, user_name FROM `user` WHERE user_id = ?",
    [userId]
  );
  if (row === undefined) throw new NotFoundError("User", userId);
  parseRow(UserRowSchema, row, "user");
};
