import type { Readable } from "node:stream";

/** One file in the store. Metadata comes from the file itself, not a side table. */
export interface StoredFile {
  storedName: string;
  sizeBytes: number;
  createdAt: Date;
}

/** FileStorage abstracts file persistence under a single flat root. */
export interface FileStorage {
  /**
   * Throws a validation error when content under this name and declared size
   * would be refused. Touches nothing on disk.
   */
  validate(storedName: string, declaredSize?: number): void;
  /**
   * Stream content into the store under `storedName`. The file only becomes
   * visible under that name once fully written.
   */
  write(storedName: string, content: Readable, declaredSize?: number): Promise<StoredFile>;
  /** Open a readable stream for the stored file. */
  read(storedName: string): Promise<Readable>;
  /** All stored files, newest first. */
  list(): Promise<StoredFile[]>;
  /** Remove the file from storage. */
  delete(storedName: string): Promise<void>;
}
