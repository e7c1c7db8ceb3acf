import cors from "cors";
import express, {
  type ErrorRequestHandler,
  type Request,
  type Response
} from "express";
import multer from "multer";
import { FALLBACK_BANNER, type AppConfig } from "./config.js";
import { PostNotFoundError, errorMessage } from "./errors.js";
import { GitHubRepository } from "./github.repository.js";
import { log } from "./logger.js";
import { createPost, toPostType } from "./post.js";
import type { Repository } from "./repository.js";
import { PostStore } from "./store.js";
import { MediaUploader, type MediaFile } from "./uploader.js";

/** Form value as submitted, untrimmed. */
function field(body: unknown, key: string): string | undefined {
  if (typeof body !== "object" || body === null) return undefined;
  const value: unknown = Reflect.get(body, key);
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  return undefined;
}

// Parts under any other name are ignored
function mediaPart(req: Request): MediaFile | undefined {
  const part = Array.isArray(req.files)
    ? req.files.find((file) => file.fieldname === "file")
    : undefined;

  return part && { name: part.originalname, content: part.buffer };
}

function fail(res: Response, route: string, error: unknown) {
  log.error(`${route} failed: ${errorMessage(error)}`);
  res.status(500).json({ error: errorMessage(error) });
}

export function createApp(
  config: AppConfig,
  repository: Repository = new GitHubRepository(config)
) {
  const store = new PostStore(repository, config.jsonPath);
  const uploader = new MediaUploader(repository, config);
  const upload = multer({ storage: multer.memoryStorage() });

  const app = express();
  app.use(cors());

  app.get("/", (_req, res) => {
    res.status(200).json({
      status: "online",
      message: "Content Manager API is running...",
      repo: config.repoName
    });
  });

  app.get("/posts", async (_req, res) => {
    try {
      const { posts } = await store.list();
      res.status(200).json(posts);
    } catch (error) {
      fail(res, "GET /posts", error);
    }
  });

  app.post(
    "/add-post",
    express.urlencoded({ extended: false }),
    upload.any(),
    async (req: Request, res: Response) => {
      try {
        const title = field(req.body, "title");
        const author = field(req.body, "author");
        if (!title?.trim() || !author?.trim()) {
          res.status(400).json({ error: "Title and Author are required" });
          return;
        }

        const uploaded = await uploader.upload(mediaPart(req), title);

        const post = createPost({
          title,
          author,
          content: field(req.body, "content") ?? "",
          type: toPostType(field(req.body, "type")),
          mediaUrl: field(req.body, "mediaUrl") ?? "",
          banner: uploaded ?? FALLBACK_BANNER
        });

        const { posts, revision } = await store.list();
        await store.insertFront(post, posts, revision);
        log.info(`Created post ${post.id} (${post.type})`);

        res.status(200).json({
          message: "Post and media uploaded successfully!",
          id: post.id,
          url: post.mediaUrl,
          banner_url: post.banner
        });
      } catch (error) {
        fail(res, "POST /add-post", error);
      }
    }
  );

  app.post(
    "/delete-post",
    express.json(),
    async (req: Request, res: Response) => {
      try {
        const id = field(req.body, "id");
        if (!id?.trim()) {
          res.status(400).json({ error: "Post ID is required" });
          return;
        }

        await store.removeById(id);
        log.info(`Deleted post ${id}`);
        res.status(200).json({ message: "Post deleted successfully!" });
      } catch (error) {
        if (error instanceof PostNotFoundError) {
          res.status(404).json({ error: error.message });
          return;
        }
        fail(res, "POST /delete-post", error);
      }
    }
  );

  const onError: ErrorRequestHandler = (error: unknown, req, res, _next) => {
    const status = Reflect.get(Object(error), "status");
    if (status === 400) {
      log.warn(`${req.method} ${req.path} rejected: ${errorMessage(error)}`);
      res.status(400).json({ error: errorMessage(error) });
      return;
    }
    fail(res, `${req.method} ${req.path}`, error);
  };
  app.use(onError);

  return app;
}
