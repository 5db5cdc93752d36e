import { Response } from "express";
import type { CommentRepository } from "../repositories/commentRepository.js";
import type { CommentParent } from "../models/Comment.js";
import { AuthRequest } from "../middleware/authMiddleware.js";
import { operationOptions } from "../middleware/abortMiddleware.js";
import { asyncHandler } from "../middleware/errorMiddleware.js";
import { ValidationError } from "../utils/errors.js";
import { presentComment, presentThread } from "./presenters.js";
import { requireActor } from "./postController.js";
import {
  CommentParamsSchema,
  CreateCommentSchema,
  ListCommentsQuerySchema,
  PostParamsSchema,
  UpdateCommentSchema,
  parseInput,
} from "./requestSchemas.js";

const toParent = (input: { postId?: string; parentCommentId?: string }): CommentParent => {
  if (input.postId !== undefined) return { kind: "post", postId: input.postId };
  if (input.parentCommentId !== undefined) {
    return { kind: "comment", commentId: input.parentCommentId };
  }
  throw new ValidationError("Exactly one of postId or parentCommentId is required");
};

export const createCommentController = (comments: CommentRepository) => ({
  // --- GET THREAD FOR A POST ---
  listComments: asyncHandler(async (req: AuthRequest, res: Response) => {
    const { postId } = parseInput(PostParamsSchema, req.params);
    const { order } = parseInput(ListCommentsQuerySchema, req.query);
    const thread = await comments.listComments(postId, order, operationOptions(req));
    res.json(presentThread(thread));
  }),

  // --- GET SINGLE COMMENT ---
  getComment: asyncHandler(async (req: AuthRequest, res: Response) => {
    const { commentId } = parseInput(CommentParamsSchema, req.params);
    const comment = await comments.getComment(commentId, operationOptions(req));
    res.json(presentComment(comment));
  }),

  // --- ADD A COMMENT OR REPLY ---
  createComment: asyncHandler(async (req: AuthRequest, res: Response) => {
    const actor = requireActor(req);
    const input = parseInput(CreateCommentSchema, req.body);
    const comment = await comments.createComment(
      actor.userId,
      toParent(input),
      input.body,
      operationOptions(req)
    );
    res.status(201).json(presentComment(comment));
  }),

  // --- EDIT COMMENT (author only) ---
  updateComment: asyncHandler(async (req: AuthRequest, res: Response) => {
    const actor = requireActor(req);
    const { commentId } = parseInput(CommentParamsSchema, req.params);
    const { body } = parseInput(UpdateCommentSchema, req.body);
    const comment = await comments.updateComment(actor, commentId, body, operationOptions(req));
    res.json(presentComment(comment));
  }),

  // --- DELETE COMMENT (tombstone, replies stay) ---
  deleteComment: asyncHandler(async (req: AuthRequest, res: Response) => {
    const actor = requireActor(req);
    const { commentId } = parseInput(CommentParamsSchema, req.params);
    const tombstone = await comments.deleteComment(actor, commentId, operationOptions(req));
    res.json(presentComment(tombstone));
  }),
});
