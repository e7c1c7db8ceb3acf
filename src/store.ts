import {
  PostNotFoundError,
  StoreMissingError,
  errorMessage
} from "./errors.js";
import { log } from "./logger.js";
import { isPost, type Post } from "./post.js";
import type { Repository } from "./repository.js";

/** Records written by older clients are kept as they are. */
export type StoredPost = Post | Readonly<Record<string, unknown>>;

export interface StoreSnapshot {
  readonly posts: StoredPost[];
  /** `null` when the store file has never been written. */
  readonly revision: string | null;
}

function isRecord(value: unknown): value is Readonly<Record<string, unknown>> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parsePosts(raw: Buffer, path: string): StoredPost[] {
  const data: unknown = JSON.parse(raw.toString("utf8"));
  if (!Array.isArray(data) || !data.every(isRecord)) {
    throw new Error(`${path} is not an array of records`);
  }
  return data;
}

const serialize = (posts: readonly StoredPost[]) =>
  JSON.stringify(posts, null, 2);

/**
 * The post index: one JSON array in the repository, newest first.
 * Every call re-reads the file; nothing is cached between requests.
 */
export class PostStore {
  constructor(
    private readonly repository: Repository,
    public readonly path: string
  ) {}

  async list(): Promise<StoreSnapshot> {
    try {
      const file = await this.repository.fetchFile(this.path);
      if (!file) return { posts: [], revision: null };

      return {
        posts: parsePosts(file.content, this.path),
        revision: file.revision
      };
    } catch (error) {
      log.warn(
        `Reading ${this.path} failed, starting from an empty store: ` +
          errorMessage(error)
      );
      return { posts: [], revision: null };
    }
  }

  async insertFront(
    post: Post,
    posts: readonly StoredPost[],
    revision: string | null
  ): Promise<StoredPost[]> {
    const updated = [post, ...posts];
    const message = `New post: ${post.title}`;
    const content = serialize(updated);

    if (revision === null) {
      await this.repository.createFile(this.path, message, content);
    } else {
      await this.repository.updateFile(this.path, message, content, revision);
    }

    return updated;
  }

  async removeById(id: string): Promise<Post> {
    const file = await this.repository.fetchFile(this.path);
    if (!file) throw new StoreMissingError(this.path);

    const posts = parsePosts(file.content, this.path);
    const removed = posts.find(
      (post): post is Post => isPost(post) && post.id === id
    );
    if (!removed) throw new PostNotFoundError(id);

    const remaining = posts.filter((post) => post.id !== id);
    await this.repository.updateFile(
      this.path,
      `Delete post: ${removed.title}`,
      serialize(remaining),
      file.revision
    );
    return removed;
  }
}
