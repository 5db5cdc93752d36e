import { z } from "zod";
import type { SqlValue } from "../config/db.js";
import type { UserId } from "./User.js";
import { parseRow } from "./rows.js";

export const POST_TITLE_MAX = 200;
export const POST_BODY_MAX = 100_000;

export interface Post {
  readonly id: string;
  readonly authorId: UserId;
  readonly authorName: string | null;
  readonly title: string;
  /** Source code, stored verbatim. */
  readonly body: string;
  readonly likes: number;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export interface PostPage {
  readonly items: readonly Post[];
  readonly page: number;
  readonly pageSize: number;
  readonly total: number;
  readonly pages: number;
}

export interface PostDeletion {
  readonly postId: string;
  readonly deletedComments: number;
}

export type LikeMode = "increment" | "decrement";

export const PostRowSchema = z.object({
  post_id: z.string(),
  user_id: z.string(),
  user_name: z.string().nullable(),
  title: z.string(),
  body: z.string(),
  likes: z.number().int(),
  created_at: z.date(),
  updated_at: z.date(),
});

export type PostRow = z.infer<typeof PostRowSchema>;

/** Column list matching PostRowSchema; `p` is post, `u` is user. */
export const POST_SELECT = `SELECT p.post_id, p.user_id, u.user_name, p.title, p.body, p.likes, p.created_at, p.updated_at
FROM \`post\` p
LEFT JOIN \`user\` u ON u.user_id = p.user_id`;

export const POST_INSERT = `INSERT INTO \`post\` (post_id, user_id, title, body, likes, created_at, updated_at)
VALUES (?, ?, ?, ?, ?, ?, ?)`;

export const toPost = (row: unknown): Post => {
  const parsed = parseRow(PostRowSchema, row, "post");
  return {
    id: parsed.post_id,
    authorId: parsed.user_id,
    authorName: parsed.user_name,
    title: parsed.title,
    body: parsed.body,
    likes: parsed.likes,
    createdAt: parsed.created_at,
    updatedAt: parsed.updated_at,
  };
};

/** Positional values for POST_INSERT. */
export const toPostInsertParams = (post: Post): SqlValue[] => [
  post.id,
  post.authorId,
  post.title,
  post.body,
  post.likes,
  post.createdAt,
  post.updatedAt,
];
