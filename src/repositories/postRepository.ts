import { ulid } from "ulid";
import { z } from "zod";
import type { Database, OperationOptions, Session } from "../config/db.js";
import {
  AuthorizationError,
  NotFoundError,
  ValidationError,
} from "../utils/errors.js";
import {
  POST_BODY_MAX,
  POST_INSERT,
  POST_SELECT,
  POST_TITLE_MAX,
  toPost,
  toPostInsertParams,
  type LikeMode,
  type Post,
  type PostDeletion,
  type PostPage,
} from "../models/Post.js";
import { canModerate, type Actor, type UserId } from "../models/User.js";
import { CountRowSchema, parseRow } from "../models/rows.js";
import { requireUser } from "./users.js";
import { requirePositiveInt, requireText } from "./validation.js";

export const MAX_PAGE_SIZE = 100;

export interface PostChanges {
  title?: string;
  body?: string;
}

export interface PostRepository {
  createPost(author: UserId, title: string, body: string, options?: OperationOptions): Promise<Post>;
  getPost(id: string, options?: OperationOptions): Promise<Post>;
  listPosts(page: number, pageSize: number, options?: OperationOptions): Promise<PostPage>;
  updatePost(actor: Actor, id: string, changes: PostChanges, options?: OperationOptions): Promise<Post>;
  deletePost(actor: Actor, id: string, options?: OperationOptions): Promise<PostDeletion>;
  adjustLikes(id: string, mode: LikeMode, options?: OperationOptions): Promise<number>;
}

export interface RepositoryOptions {
  now?: () => Date;
  generateId?: () => string;
}

const LockedPostSchema = z.object({
  post_id: z.string(),
  user_id: z.string(),
  likes: z.number().int(),
});

const titleRule = { field: "title", max: POST_TITLE_MAX, trim: true };
const bodyRule = { field: "body", max: POST_BODY_MAX, trim: false };

export class MysqlPostRepository implements PostRepository {
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(
    private readonly db: Database,
    { now = () => new Date(), generateId = () => ulid() }: RepositoryOptions = {}
  ) {
    this.now = now;
    this.generateId = generateId;
  }

  async createPost(
    author: UserId,
    title: string,
    body: string,
    options?: OperationOptions
  ): Promise<Post> {
    const createdAt = this.now();
    const post: Post = {
      id: this.generateId(),
      authorId: author,
      authorName: null,
      title: requireText(title, titleRule),
      body: requireText(body, bodyRule),
      likes: 0,
      createdAt,
      updatedAt: createdAt,
    };

    return this.db.transaction(async (session) => {
      await requireUser(session, author);
      await session.run(POST_INSERT, toPostInsertParams(post));
      return this.readPost(session, post.id);
    }, options);
  }

  getPost(id: string, options?: OperationOptions): Promise<Post> {
    return this.db.withSession((session) => this.readPost(session, id), options);
  }

  /**
   * Newest first; equal timestamps fall back to id so pages never shift.
   * The count and the page are read in one transaction so they agree.
   */
  async listPosts(page: number, pageSize: number, options?: OperationOptions): Promise<PostPage> {
    requirePositiveInt(page, "page");
    requirePositiveInt(pageSize, "pageSize", MAX_PAGE_SIZE);

    return this.db.transaction(async (session) => {
      const [countRow] = await session.rows("SELECT COUNT(*) AS total FROM `post`");
      const { total } = parseRow(CountRowSchema, countRow, "post");
      const rows = await session.rows(
        `${POST_SELECT}
ORDER BY p.created_at DESC, p.post_id DESC
LIMIT ? OFFSET ?`,
        [pageSize, (page - 1) * pageSize]
      );

      return {
        items: rows.map(toPost),
        page,
        pageSize,
        total,
        pages: Math.ceil(total / pageSize),
      };
    }, options);
  }

  async updatePost(
    actor: Actor,
    id: string,
    changes: PostChanges,
    options?: OperationOptions
  ): Promise<Post> {
    const assignments: string[] = [];
    const values: string[] = [];
    if (changes.title !== undefined) {
      assignments.push("title = ?");
      values.push(requireText(changes.title, titleRule));
    }
    if (changes.body !== undefined) {
      assignments.push("body = ?");
      values.push(requireText(changes.body, bodyRule));
    }
    if (assignments.length === 0) {
      throw new ValidationError("Nothing to update: provide a title or a body");
    }

    return this.db.transaction(async (session) => {
      const locked = await this.lockPost(session, id);
      if (locked.user_id !== actor.userId) {
        throw new AuthorizationError("Only the author can edit this post");
      }
      await session.run(
        `UPDATE \`post\` SET ${assignments.join(", ")}, updated_at = ? WHERE post_id = ?`,
        [...values, this.now(), id]
      );
      return this.readPost(session, id);
    }, options);
  }

  /**
   * Remove the post and every comment of its thread in one transaction.
   * The exclusive lock on the post row waits out any comment insert that
   * already holds a share lock on it, so nothing is left orphaned.
   */
  async deletePost(actor: Actor, id: string, options?: OperationOptions): Promise<PostDeletion> {
    return this.db.transaction(async (session) => {
      const locked = await this.lockPost(session, id);
      if (!canModerate(actor, locked.user_id)) {
        throw new AuthorizationError("Only the author or a moderator can delete this post");
      }
      const comments = await session.run("DELETE FROM `comment` WHERE post_id = ?", [id]);
      await session.run("DELETE FROM `post` WHERE post_id = ?", [id]);
      return { postId: id, deletedComments: comments.affectedRows };
    }, options);
  }

  async adjustLikes(id: string, mode: LikeMode, options?: OperationOptions): Promise<number> {
    return this.db.transaction(async (session) => {
      const locked = await this.lockPost(session, id);
      const likes = Math.max(0, locked.likes + (mode === "increment" ? 1 : -1));
      await session.run("UPDATE `post` SET likes = ? WHERE post_id = ?", [likes, id]);
      return likes;
    }, options);
  }

  private async readPost(session: Session, id: string): Promise<Post> {
    const [row] = await session.rows(`${POST_SELECT}\nWHERE p.post_id = ?`, [id]);
    if (row === undefined) throw new NotFoundError("Post", id);
    return toPost(row);
  }

  private async lockPost(session: Session, id: string) {
    const [row] = await session.rows(
      "SELECT post_id, user_id, likes FROM `post` WHERE post_id = ? FOR UPDATE",
      [id]
    );
    if (row === undefined) throw new NotFoundError("Post", id);
    return parseRow(LockedPostSchema, row, "post");
  }
}
