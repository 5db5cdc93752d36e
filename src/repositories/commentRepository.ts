import { ulid } from "ulid";
import { z } from "zod";
import type { Database, OperationOptions, Session } from "../config/db.js";
import { AuthorizationError, NotFoundError } from "../utils/errors.js";
import { Logger } from "../utils/logger.js";
import {
  COMMENT_BODY_MAX,
  COMMENT_INSERT,
  COMMENT_SELECT,
  isTombstoned,
  toComment,
  toCommentInsertParams,
  type Comment,
  type CommentParent,
} from "../models/Comment.js";
import { CommentThread, type SiblingOrder } from "../models/CommentThread.js";
import { canModerate, type Actor, type UserId } from "../models/User.js";
import { parseRow } from "../models/rows.js";
import type { RepositoryOptions } from "./postRepository.js";
import { requireUser } from "./users.js";
import { requireText } from "./validation.js";

export interface CommentRepository {
  createComment(author: UserId, parent: CommentParent, body: string, options?: OperationOptions): Promise<Comment>;
  getComment(id: string, options?: OperationOptions): Promise<Comment>;
  listComments(postId: string, ordering: SiblingOrder, options?: OperationOptions): Promise<CommentThread>;
  updateComment(actor: Actor, id: string, body: string, options?: OperationOptions): Promise<Comment>;
  /** Tombstones the comment; its replies stay where they are. */
  deleteComment(actor: Actor, id: string, options?: OperationOptions): Promise<Comment>;
}

const ParentRowSchema = z.object({
  post_id: z.string(),
  deleted_at: z.date().nullable(),
});

const LockedCommentSchema = z.object({
  comment_id: z.string(),
  user_id: z.string(),
  deleted_at: z.date().nullable(),
});

const bodyRule = { field: "body", max: COMMENT_BODY_MAX, trim: true };

export class MysqlCommentRepository implements CommentRepository {
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(
    private readonly db: Database,
    { now = () => new Date(), generateId = () => ulid() }: RepositoryOptions = {}
  ) {
    this.now = now;
    this.generateId = generateId;
  }

  /**
   * Lock order is post row first, then the parent comment. deletePost takes
   * the same post lock exclusively, so a reply either commits before the
   * cascade (and is removed by it) or finds the post gone.
   */
  async createComment(
    author: UserId,
    parent: CommentParent,
    body: string,
    options?: OperationOptions
  ): Promise<Comment> {
    const text = requireText(body, bodyRule);

    return this.db.transaction(async (session) => {
      await requireUser(session, author);

      const postId =
        parent.kind === "post"
          ? parent.postId
          : (await this.readParent(session, parent.commentId, false)).post_id;

      const [post] = await session.rows(
        "SELECT post_id FROM `post` WHERE post_id = ? LOCK IN SHARE MODE",
        [postId]
      );
      if (post === undefined) throw new NotFoundError("Post", postId);

      if (parent.kind === "comment") {
        const locked = await this.readParent(session, parent.commentId, true);
        if (locked.post_id !== postId || locked.deleted_at !== null) {
          throw new NotFoundError("Comment", parent.commentId);
        }
      }

      const createdAt = this.now();
      const comment: Comment = {
        id: this.generateId(),
        postId,
        parent,
        authorId: author,
        authorName: null,
        body: text,
        createdAt,
        updatedAt: createdAt,
        deletedAt: null,
      };
      await session.run(COMMENT_INSERT, toCommentInsertParams(comment));
      return this.readComment(session, comment.id);
    }, options);
  }

  async getComment(id: string, options?: OperationOptions): Promise<Comment> {
    const comment = await this.db.withSession(
      (session) => this.readComment(session, id),
      options
    );
    if (isTombstoned(comment)) throw new NotFoundError("Comment", id);
    return comment;
  }

  /**
   * Rows are loaded in one session and the connection is released before
   * the caller starts walking the thread.
   */
  async listComments(
    postId: string,
    ordering: SiblingOrder,
    options?: OperationOptions
  ): Promise<CommentThread> {
    const comments = await this.db.withSession(async (session) => {
      const [post] = await session.rows("SELECT post_id FROM `post` WHERE post_id = ?", [postId]);
      if (post === undefined) throw new NotFoundError("Post", postId);

      const rows = await session.rows(
        `${COMMENT_SELECT}
WHERE c.post_id = ?
ORDER BY c.created_at ASC, c.comment_id ASC`,
        [postId]
      );
      return rows.map(toComment);
    }, options);

    const thread = new CommentThread(postId, comments, ordering);
    if (thread.orphanIds.length > 0) {
      Logger.warn("Skipped comments detached from their thread", {
        postId,
        orphanIds: thread.orphanIds,
      });
    }
    return thread;
  }

  async updateComment(
    actor: Actor,
    id: string,
    body: string,
    options?: OperationOptions
  ): Promise<Comment> {
    const text = requireText(body, bodyRule);

    return this.db.transaction(async (session) => {
      const locked = await this.lockLiveComment(session, id);
      if (locked.user_id !== actor.userId) {
        throw new AuthorizationError("Only the author can edit this comment");
      }
      await session.run(
        "UPDATE `comment` SET body = ?, updated_at = ? WHERE comment_id = ?",
        [text, this.now(), id]
      );
      return this.readComment(session, id);
    }, options);
  }

  async deleteComment(actor: Actor, id: string, options?: OperationOptions): Promise<Comment> {
    return this.db.transaction(async (session) => {
      const locked = await this.lockLiveComment(session, id);
      if (!canModerate(actor, locked.user_id)) {
        throw new AuthorizationError("Only the author or a moderator can delete this comment");
      }
      const deletedAt = this.now();
      await session.run(
        "UPDATE `comment` SET body = NULL, deleted_at = ?, updated_at = ? WHERE comment_id = ?",
        [deletedAt, deletedAt, id]
      );
      return this.readComment(session, id);
    }, options);
  }

  private async readParent(session: Session, commentId: string, lock: boolean) {
    const [row] = await session.rows(
      `SELECT post_id, deleted_at FROM \`comment\` WHERE comment_id = ?${lock ? " LOCK IN SHARE MODE" : ""}`,
      [commentId]
    );
    if (row === undefined) throw new NotFoundError("Comment", commentId);
    return parseRow(ParentRowSchema, row, "comment");
  }

  private async readComment(session: Session, id: string): Promise<Comment> {
    const [row] = await session.rows(`${COMMENT_SELECT}\nWHERE c.comment_id = ?`, [id]);
    if (row === undefined) throw new NotFoundError("Comment", id);
    return toComment(row);
  }

  private async lockLiveComment(session: Session, id: string) {
    const [row] = await session.rows(
      "SELECT comment_id, user_id, deleted_at FROM `comment` WHERE comment_id = ? FOR UPDATE",
      [id]
    );
    if (row === undefined) throw new NotFoundError("Comment", id);
    const locked = parseRow(LockedCommentSchema, row, "comment");
    if (locked.deleted_at !== null) throw new NotFoundError("Comment", id);
    return locked;
  }
}
