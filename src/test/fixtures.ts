import type { Comment, CommentParent, CommentRow } from "../models/Comment.js";
import type { Post, PostRow } from "../models/Post.js";

export const T0 = new Date("2024-03-01T09:00:00.000Z");

export const at = (minutes: number): Date => new Date(T0.getTime() + minutes * 60_000);

export const postRow = (overrides: Partial<PostRow> = {}): PostRow => ({
  post_id: "post-1",
  user_id: "u1",
  user_name: "alice",
  title: "Hello",
  body: 'fn main() {\n  println!("hi");\n}',
  likes: 0,
  created_at: T0,
  updated_at: T0,
  ...overrides,
});

export const commentRow = (overrides: Partial<CommentRow> = {}): CommentRow => ({
  comment_id: "c-1",
  post_id: "post-1",
  parent_comment_id: null,
  user_id: "u2",
  user_name: "bob",
  body: "nice!",
  created_at: T0,
  updated_at: T0,
  deleted_at: null,
  ...overrides,
});

export const makePost = (overrides: Partial<Post> = {}): Post => ({
  id: "post-1",
  authorId: "u1",
  authorName: "alice",
  title: "Hello",
  body: "console.log(1);",
  likes: 0,
  createdAt: T0,
  updatedAt: T0,
  ...overrides,
});

/** Comment on post-1; `parent` is a comment id, or omitted for a top-level comment. */
export const makeComment = (
  id: string,
  parent?: string,
  createdAt: Date = T0,
  overrides: Partial<Comment> = {}
): Comment => {
  const parentRef: CommentParent =
    parent === undefined ? { kind: "post", postId: "post-1" } : { kind: "comment", commentId: parent };
  return {
    id,
    postId: "post-1",
    parent: parentRef,
    authorId: "u2",
    authorName: "bob",
    body: `comment ${id}`,
    createdAt,
    updatedAt: createdAt,
    deletedAt: null,
    ...overrides,
  };
};
