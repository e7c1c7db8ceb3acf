import fetch, { type RequestInit, type Response } from "node-fetch";
import type { AppConfig } from "./config.js";
import { ConflictError, RepositoryError } from "./errors.js";
import type {
  FileContent,
  Repository,
  RepositoryFile
} from "./repository.js";

export type Fetch = (url: string, init?: RequestInit) => Promise<Response>;

type GitHubConfig = Pick<
  AppConfig,
  "githubToken" | "repoName" | "apiUrl" | "branch"
>;

interface ContentsResponse {
  content?: unknown;
  encoding?: unknown;
  sha?: unknown;
  message?: unknown;
}

function isContentsResponse(value: unknown): value is ContentsResponse {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const toBuffer = (content: FileContent) =>
  typeof content === "string" ? Buffer.from(content, "utf8") : content;

/** Files of one branch of a GitHub repository, via the REST contents API. */
export class GitHubRepository implements Repository {
  readonly #config: GitHubConfig;
  readonly #fetch: Fetch;

  constructor(config: GitHubConfig, fetcher: Fetch = fetch) {
    this.#config = config;
    this.#fetch = fetcher;
  }

  async fetchFile(path: string): Promise<RepositoryFile | null> {
    const ref = encodeURIComponent(this.#config.branch);
    const response = await this.#fetch(
      `${this.#contentsUrl(path)}?ref=${ref}`,
      { headers: this.#headers() }
    );

    if (response.status === 404) return null;
    if (!response.ok) throw await this.#failure(response, `fetch ${path}`);

    const body: unknown = await response.json();
    if (
      !isContentsResponse(body) ||
      typeof body.content !== "string" ||
      typeof body.sha !== "string"
    ) {
      throw new RepositoryError(
        `Unexpected contents response for ${path}`,
        response.status
      );
    }

    // Files over 1 MB come back with encoding "none" and no content
    if (body.encoding !== "base64") {
      throw new RepositoryError(
        `${path} is not readable through the contents API ` +
          `(encoding ${String(body.encoding)})`,
        response.status
      );
    }

    return {
      // base64 from the API is wrapped with newlines
      content: Buffer.from(body.content.replace(/\s/g, ""), "base64"),
      revision: body.sha
    };
  }

  async createFile(
    path: string,
    message: string,
    content: FileContent
  ): Promise<void> {
    await this.#put(path, message, content);
  }

  async updateFile(
    path: string,
    message: string,
    content: FileContent,
    revision: string
  ): Promise<void> {
    await this.#put(path, message, content, revision);
  }

  async #put(
    path: string,
    message: string,
    content: FileContent,
    sha?: string
  ) {
    const response = await this.#fetch(this.#contentsUrl(path), {
      method: "PUT",
      headers: { ...this.#headers(), "Content-Type": "application/json" },
      body: JSON.stringify({
        message,
        content: toBuffer(content).toString("base64"),
        branch: this.#config.branch,
        ...(sha ? { sha } : {})
      })
    });

    if (response.status === 409) throw new ConflictError(path);
    if (!response.ok) throw await this.#failure(response, `write ${path}`);
  }

  #contentsUrl(path: string) {
    const { apiUrl, repoName } = this.#config;
    const encoded = path.split("/").map(encodeURIComponent).join("/");
    return `${apiUrl}/repos/${repoName}/contents/${encoded}`;
  }

  #headers() {
    return {
      Accept: "application/vnd.github+json",
      Authorization: `Bearer ${this.#config.githubToken}`,
      "X-GitHub-Api-Version": "2022-11-28",
      "User-Agent": "repo-post-publisher"
    };
  }

  async #failure(response: Response, action: string) {
    let detail = response.statusText;
    const text = await response.text();
    try {
      const body: unknown = JSON.parse(text);
      if (isContentsResponse(body) && typeof body.message === "string") {
        detail = body.message;
      }
    } catch {
      if (text) detail = text;
    }

    return new RepositoryError(
      `GitHub API failed to ${action} (${response.status}): ${detail}`,
      response.status
    );
  }
}
