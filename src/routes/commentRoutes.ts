import { RequestHandler, Router } from "express";
import type { CommentRepository } from "../repositories/commentRepository.js";
import { createCommentController } from "../controllers/commentController.js";

export const createCommentRoutes = (
  comments: CommentRepository,
  requireAuth: RequestHandler
): Router => {
  const router = Router();
  const controller = createCommentController(comments);

  router.get("/:commentId", controller.getComment); // Single comment
  router.post("/", requireAuth, controller.createComment); // Comment on a post or reply to a comment
  router.put("/:commentId", requireAuth, controller.updateComment); // Edit own comment
  router.delete("/:commentId", requireAuth, controller.deleteComment); // Tombstone a comment

  return router;
};
