import { RequestHandler, Router } from "express";
import type { PostRepository } from "../repositories/postRepository.js";
import type { CommentRepository } from "../repositories/commentRepository.js";
import { createPostController } from "../controllers/postController.js";
import { createCommentController } from "../controllers/commentController.js";

export const createPostRoutes = (
  posts: PostRepository,
  comments: CommentRepository,
  requireAuth: RequestHandler
): Router => {
  const router = Router();
  const postController = createPostController(posts);
  const { listComments } = createCommentController(comments);

  /* ---------- FEED ---------- */
  router.get("/", postController.listPosts);

  /* ---------- SINGLE POST & ITS THREAD ---------- */
  router.get("/:postId", postController.getPost);
  router.get("/:postId/comments", listComments);

  /* ---------- CREATE / EDIT / DELETE ---------- */
  router.post("/", requireAuth, postController.createPost);
  router.put("/:postId", requireAuth, postController.updatePost);
  router.delete("/:postId", requireAuth, postController.deletePost);

  /* ---------- LIKES ---------- */
  router.patch("/:postId/likes", requireAuth, postController.adjustLikes);

  return router;
};
