export class ConfigError extends Error {
  override readonly name = "ConfigError";
}

/** Non-success answer from the repository host. */
export class RepositoryError extends Error {
  override readonly name: string = "RepositoryError";

  constructor(message: string, public readonly status: number) {
    super(message);
  }
}

/** The revision marker given to an update is no longer the latest one. */
export class ConflictError extends RepositoryError {
  override readonly name = "ConflictError";

  constructor(public readonly path: string, status = 409) {
    super(`Revision conflict while updating ${path}`, status);
  }
}

export class StoreMissingError extends Error {
  override readonly name = "StoreMissingError";

  constructor(public readonly path: string) {
    super(`Post store ${path} does not exist`);
  }
}

export class PostNotFoundError extends Error {
  override readonly name = "PostNotFoundError";

  constructor(public readonly id: string) {
    super("Post not found");
  }
}

export class UploadError extends Error {
  override readonly name = "UploadError";

  constructor(cause: unknown) {
    super(`File upload failed: ${errorMessage(cause)}`, { cause });
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
