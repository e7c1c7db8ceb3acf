export interface RepositoryFile {
  readonly content: Buffer;
  /** Opaque revision marker required to overwrite the file. */
  readonly revision: string;
}

export type FileContent = Buffer | string;

export interface Repository {
  /** Resolves `null` when no file exists at `path`. */
  fetchFile(path: string): Promise<RepositoryFile | null>;
  createFile(
    path: string,
    message: string,
    content: FileContent
  ): Promise<void>;
  /** Rejects with `ConflictError` when `revision` is stale. */
  updateFile(
    path: string,
    message: string,
    content: FileContent,
    revision: string
  ): Promise<void>;
}
