import { z } from "zod";
import { ValidationError } from "../utils/errors.js";
import { COMMENT_BODY_MAX } from "../models/Comment.js";
import { POST_BODY_MAX, POST_TITLE_MAX } from "../models/Post.js";
import { MAX_PAGE_SIZE } from "../repositories/postRepository.js";

// Shape and size only; blank text is rejected by the repositories.
// Text the repositories store trimmed is trimmed here before its length check.

const id = z.string().min(1).max(64);

export const PostParamsSchema = z.object({ postId: id });
export const CommentParamsSchema = z.object({ commentId: id });

export const ListPostsQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  pageSize: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(20),
});

export const CreatePostSchema = z.object({
  title: z.string().trim().max(POST_TITLE_MAX),
  body: z.string().max(POST_BODY_MAX),
});

export const UpdatePostSchema = z
  .object({
    title: z.string().trim().max(POST_TITLE_MAX).optional(),
    body: z.string().max(POST_BODY_MAX).optional(),
  })
  .refine((changes) => changes.title !== undefined || changes.body !== undefined, {
    message: "Provide a title or a body",
  });

export const LikesSchema = z.object({
  mode: z.enum(["increment", "decrement"]),
});

export const ListCommentsQuerySchema = z.object({
  order: z.enum(["oldest", "newest"]).default("oldest"),
});

export const CreateCommentSchema = z
  .object({
    postId: id.optional(),
    parentCommentId: id.optional(),
    body: z.string().trim().max(COMMENT_BODY_MAX),
  })
  .refine((input) => (input.postId === undefined) !== (input.parentCommentId === undefined), {
    message: "Exactly one of postId or parentCommentId is required",
  });

export const UpdateCommentSchema = z.object({
  body: z.string().trim().max(COMMENT_BODY_MAX),
});

export const parseInput = <Schema extends z.ZodTypeAny>(
  schema: Schema,
  input: unknown
): z.output<Schema> => {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(
      "Invalid request",
      result.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      }))
    );
  }
  return result.data;
};
