import { loadConfig, type AppConfig } from "../../src/config.js";
import type { Post } from "../../src/post.js";

export function testConfig(overrides: Record<string, string> = {}): AppConfig {
  return loadConfig({
    GITHUB_TOKEN: "test-token",
    GITHUB_REPO_NAME: "owner/site",
    WEBSITE_URL: "https://example.org",
    ...overrides
  });
}

export function samplePost(id: string, title = `Post ${id}`): Post {
  return {
    id,
    title,
    author: "Test Author",
    date: "Jan 02, 2026",
    type: "article",
    banner: "https://example.org/banner.png",
    content: "Body text",
    mediaType: "none",
    mediaUrl: ""
  };
}
