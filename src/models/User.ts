import { z } from "zod";

/** Opaque reference issued by the account system. */
export type UserId = string;

export type UserRole = "member" | "moderator";

/** The authenticated caller of a repository operation. */
export interface Actor {
  readonly userId: UserId;
  readonly role: UserRole;
}

export const UserRowSchema = z.object({
  user_id: z.string(),
  user_name: z.string(),
});

export const canModerate = (actor: Actor, ownerId: UserId): boolean =>
  actor.userId === ownerId || actor.role === "moderator";
