import type { Comment } from "../models/Comment.js";
import type { CommentThread } from "../models/CommentThread.js";
import type { Post, PostPage } from "../models/Post.js";

// Response shapes sent to the client app

export const presentPost = (post: Post) => ({
  id: post.id,
  authorId: post.authorId,
  authorName: post.authorName,
  title: post.title,
  body: post.body,
  likes: post.likes,
  createdAt: post.createdAt.toISOString(),
  updatedAt: post.updatedAt.toISOString(),
});

export const presentPostPage = (page: PostPage) => ({
  posts: page.items.map(presentPost),
  page: page.page,
  pageSize: page.pageSize,
  total: page.total,
  pages: page.pages,
});

export const presentComment = (comment: Comment) => ({
  id: comment.id,
  postId: comment.postId,
  parentType: comment.parent.kind,
  parentId: comment.parent.kind === "post" ? comment.parent.postId : comment.parent.commentId,
  authorId: comment.authorId,
  authorName: comment.authorName,
  body: comment.body,
  deleted: comment.deletedAt !== null,
  createdAt: comment.createdAt.toISOString(),
  updatedAt: comment.updatedAt.toISOString(),
});

export const presentThread = (thread: CommentThread) => ({
  postId: thread.postId,
  order: thread.order,
  total: thread.size,
  comments: thread.toArray().map(({ comment, depth }) => ({
    ...presentComment(comment),
    depth,
  })),
});
