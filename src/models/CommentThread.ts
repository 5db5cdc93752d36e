import { DataIntegrityError } from "../utils/errors.js";
import type { Comment } from "./Comment.js";

export type SiblingOrder = "oldest" | "newest";

export interface ThreadEntry {
  readonly comment: Comment;
  /** 0 for direct replies to the post. */
  readonly depth: number;
}

type Reach = "reachable" | "unreachable";

const compareSiblings =
  (order: SiblingOrder) =>
  (a: Comment, b: Comment): number => {
    const byTime = a.createdAt.getTime() - b.createdAt.getTime();
    const byId = a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
    const ascending = byTime !== 0 ? byTime : byId;
    return order === "oldest" ? ascending : -ascending;
  };

/**
 * The comments of one post arranged as a tree.
 *
 * Iteration is pre-order (a parent always comes before its replies) and can
 * be repeated; each pass walks the tree again with an explicit stack.
 * Comments whose parent chain does not end at the post are left out and
 * listed in `orphanIds`. A cycle in the parent chains throws.
 */
export class CommentThread implements Iterable<ThreadEntry> {
  readonly orphanIds: readonly string[];
  private readonly reachableCount: number;
  private readonly roots: readonly Comment[];
  private readonly replies: ReadonlyMap<string, readonly Comment[]>;

  constructor(
    readonly postId: string,
    comments: readonly Comment[],
    readonly order: SiblingOrder = "oldest"
  ) {
    const byId = new Map(comments.map((comment) => [comment.id, comment]));
    const reach = resolveReach(postId, byId);

    const roots: Comment[] = [];
    const replies = new Map<string, Comment[]>();
    const orphanIds: string[] = [];

    for (const comment of byId.values()) {
      if (reach.get(comment.id) !== "reachable") {
        orphanIds.push(comment.id);
        continue;
      }
      if (comment.parent.kind === "post") {
        roots.push(comment);
        continue;
      }
      const siblings = replies.get(comment.parent.commentId);
      if (siblings) siblings.push(comment);
      else replies.set(comment.parent.commentId, [comment]);
    }

    const compare = compareSiblings(order);
    roots.sort(compare);
    for (const siblings of replies.values()) siblings.sort(compare);

    this.roots = roots;
    this.replies = replies;
    this.orphanIds = orphanIds.sort();
    this.reachableCount = byId.size - orphanIds.length;
  }

  /** Number of comments the thread yields. */
  get size(): number {
    return this.reachableCount;
  }

  *[Symbol.iterator](): Iterator<ThreadEntry> {
    const stack: ThreadEntry[] = [];
    for (let i = this.roots.length - 1; i >= 0; i--) {
      stack.push({ comment: this.roots[i], depth: 0 });
    }

    let entry = stack.pop();
    while (entry) {
      yield entry;
      const children = this.replies.get(entry.comment.id) ?? [];
      for (let i = children.length - 1; i >= 0; i--) {
        stack.push({ comment: children[i], depth: entry.depth + 1 });
      }
      entry = stack.pop();
    }
  }

  toArray(): ThreadEntry[] {
    return [...this];
  }
}

/**
 * Walk each comment's parent chain once, memoizing the outcome, so the whole
 * pass is linear in the number of comments.
 */
const resolveReach = (
  postId: string,
  byId: ReadonlyMap<string, Comment>
): Map<string, Reach> => {
  const reach = new Map<string, Reach>();

  for (const start of byId.values()) {
    if (reach.has(start.id)) continue;

    const path: Comment[] = [];
    const onPath = new Set<string>();
    let current: Comment | undefined = start;
    let outcome: Reach = "unreachable";

    while (current) {
      const known = reach.get(current.id);
      if (known) {
        outcome = known;
        break;
      }
      if (onPath.has(current.id)) {
        throw new DataIntegrityError(
          `Comment thread of post ${postId} contains a cycle through comment ${current.id}`,
          { postId, commentId: current.id }
        );
      }
      path.push(current);
      onPath.add(current.id);

      if (current.postId !== postId) break;
      if (current.parent.kind === "post") {
        outcome = current.parent.postId === postId ? "reachable" : "unreachable";
        break;
      }
      current = byId.get(current.parent.commentId);
    }

    for (const visited of path) reach.set(visited.id, outcome);
  }

  return reach;
};
