import { randomBytes } from "crypto";
import type { AppConfig } from "./config.js";
import { UploadError, errorMessage } from "./errors.js";
import { log } from "./logger.js";
import type { Repository } from "./repository.js";

export const ALLOWED_EXTENSIONS = new Set(["png", "jpg", "jpeg", "gif", "pdf"]);

export interface MediaFile {
  readonly name: string;
  readonly content: Buffer;
}

type UploaderConfig = Pick<
  AppConfig,
  "websiteUrl" | "uploadFolder" | "onUploadFailure"
>;

export function fileExtension(name: string): string | undefined {
  const dot = name.lastIndexOf(".");
  return dot === -1 ? undefined : name.slice(dot + 1).toLowerCase();
}

export function isAllowedFile(name: string): boolean {
  const ext = fileExtension(name);
  return ext !== undefined && ALLOWED_EXTENSIONS.has(ext);
}

export class MediaUploader {
  constructor(
    private readonly repository: Repository,
    private readonly config: UploaderConfig
  ) {}

  /**
   * Commits the file under the upload folder with a random name and
   * returns its public URL. Resolves `null` when nothing was uploaded.
   */
  async upload(
    file: MediaFile | undefined,
    title: string
  ): Promise<string | null> {
    if (!file || !isAllowedFile(file.name)) return null;

    const ext = fileExtension(file.name);
    const name = `${randomBytes(16).toString("hex")}.${ext}`;
    const path = `${this.config.uploadFolder}${name}`;

    try {
      await this.repository.createFile(
        path,
        `Upload media: ${title}`,
        file.content
      );
    } catch (error) {
      if (this.config.onUploadFailure === "propagate") {
        throw new UploadError(error);
      }
      log.warn(
        `Upload of ${file.name} failed, using fallback banner: ` +
          errorMessage(error)
      );
      return null;
    }

    log.info(`Uploaded ${file.name} to ${path}`);
    return `${this.config.websiteUrl}${path}`;
  }
}
