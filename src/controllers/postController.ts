import { Response } from "express";
import type { PostRepository } from "../repositories/postRepository.js";
import { AuthRequest } from "../middleware/authMiddleware.js";
import { operationOptions } from "../middleware/abortMiddleware.js";
import { asyncHandler } from "../middleware/errorMiddleware.js";
import { AuthenticationError } from "../utils/errors.js";
import type { Actor } from "../models/User.js";
import { presentPost, presentPostPage } from "./presenters.js";
import {
  CreatePostSchema,
  LikesSchema,
  ListPostsQuerySchema,
  PostParamsSchema,
  UpdatePostSchema,
  parseInput,
} from "./requestSchemas.js";

export const requireActor = (req: AuthRequest): Actor => {
  if (!req.user) throw new AuthenticationError();
  return req.user;
};

export const createPostController = (posts: PostRepository) => ({
  // --- LIST POSTS (newest first) ---
  listPosts: asyncHandler(async (req: AuthRequest, res: Response) => {
    const { page, pageSize } = parseInput(ListPostsQuerySchema, req.query);
    const result = await posts.listPosts(page, pageSize, operationOptions(req));
    res.json(presentPostPage(result));
  }),

  // --- GET SINGLE POST ---
  getPost: asyncHandler(async (req: AuthRequest, res: Response) => {
    const { postId } = parseInput(PostParamsSchema, req.params);
    const post = await posts.getPost(postId, operationOptions(req));
    res.json(presentPost(post));
  }),

  // --- CREATE POST ---
  createPost: asyncHandler(async (req: AuthRequest, res: Response) => {
    const actor = requireActor(req);
    const { title, body } = parseInput(CreatePostSchema, req.body);
    const post = await posts.createPost(actor.userId, title, body, operationOptions(req));
    res.status(201).json(presentPost(post));
  }),

  // --- EDIT POST (author only) ---
  updatePost: asyncHandler(async (req: AuthRequest, res: Response) => {
    const actor = requireActor(req);
    const { postId } = parseInput(PostParamsSchema, req.params);
    const changes = parseInput(UpdatePostSchema, req.body);
    const post = await posts.updatePost(actor, postId, changes, operationOptions(req));
    res.json(presentPost(post));
  }),

  // --- DELETE POST (author or moderator, comments go with it) ---
  deletePost: asyncHandler(async (req: AuthRequest, res: Response) => {
    const actor = requireActor(req);
    const { postId } = parseInput(PostParamsSchema, req.params);
    const result = await posts.deletePost(actor, postId, operationOptions(req));
    res.json({ success: true, ...result });
  }),

  // --- LIKE / UNLIKE ---
  adjustLikes: asyncHandler(async (req: AuthRequest, res: Response) => {
    requireActor(req);
    const { postId } = parseInput(PostParamsSchema, req.params);
    const { mode } = parseInput(LikesSchema, req.body);
    const likes = await posts.adjustLikes(postId, mode, operationOptions(req));
    res.json({ postId, likes });
  }),
});
