import { z } from "zod";
import type { SqlValue } from "../config/db.js";
import type { UserId } from "./User.js";
import { parseRow } from "./rows.js";

export const COMMENT_BODY_MAX = 10_000;

/** A comment hangs off exactly one thing: the post itself or another comment. */
export type CommentParent =
  | { kind: "post"; postId: string }
  | { kind: "comment"; commentId: string };

export interface Comment {
  readonly id: string;
  /** Root of the thread this comment belongs to. */
  readonly postId: string;
  readonly parent: CommentParent;
  readonly authorId: UserId;
  readonly authorName: string | null;
  /** null once the comment is tombstoned. */
  readonly body: string | null;
  readonly createdAt: Date;
  readonly updatedAt: Date;
  readonly deletedAt: Date | null;
}

export const isTombstoned = (comment: Comment): boolean => comment.deletedAt !== null;

export const CommentRowSchema = z.object({
  comment_id: z.string(),
  post_id: z.string(),
  parent_comment_id: z.string().nullable(),
  user_id: z.string(),
  user_name: z.string().nullable(),
  body: z.string().nullable(),
  created_at: z.date(),
  updated_at: z.date(),
  deleted_at: z.date().nullable(),
});

export type CommentRow = z.infer<typeof CommentRowSchema>;

export const COMMENT_SELECT = `SELECT c.comment_id, c.post_id, c.parent_comment_id, c.user_id, u.user_name, c.body, c.created_at, c.updated_at, c.deleted_at
FROM \`comment\` c
LEFT JOIN \`user\` u ON u.user_id = c.user_id`;

export const COMMENT_INSERT = `INSERT INTO \`comment\` (comment_id, post_id, parent_comment_id, user_id, body, created_at, updated_at, deleted_at)
VALUES (?, ?, ?, ?, ?, ?, ?, ?)`;

export const toComment = (row: unknown): Comment => {
  const parsed = parseRow(CommentRowSchema, row, "comment");
  const parent: CommentParent =
    parsed.parent_comment_id === null
      ? { kind: "post", postId: parsed.post_id }
      : { kind: "comment", commentId: parsed.parent_comment_id };

  return {
    id: parsed.comment_id,
    postId: parsed.post_id,
    parent,
    authorId: parsed.user_id,
    authorName: parsed.user_name,
    body: parsed.body,
    createdAt: parsed.created_at,
    updatedAt: parsed.updated_at,
    deletedAt: parsed.deleted_at,
  };
};

/** Positional values for COMMENT_INSERT. */
export const toCommentInsertParams = (comment: Comment): SqlValue[] => [
  comment.id,
  comment.postId,
  comment.parent.kind === "comment" ? comment.parent.commentId : null,
  comment.authorId,
  comment.body,
  comment.createdAt,
  comment.updatedAt,
  comment.deletedAt,
];
