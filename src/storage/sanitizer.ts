import path from "node:path";
import { invalidNameError, type Stage } from "../engine/errors.js";

export const MAX_NAME_LENGTH = 255;

// Both separators are refused on every platform, along with characters that
// are invalid in Windows file names.
const FORBIDDEN_CHARS = /[/\\\0<>:"|?*\u0001-\u001f]/;

/**
 * Validates a user-supplied name for use directly under the storage root.
 * `sanitize` returns the name unchanged or throws INVALID_NAME.
 */
export class PathSanitizer {
  private readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  sanitize(candidate: string | null | undefined, stage: Stage = "validate"): string {
    if (typeof candidate !== "string" || candidate.length === 0) {
      throw invalidNameError("Filename cannot be empty", stage);
    }
    if (candidate.length > MAX_NAME_LENGTH) {
      throw invalidNameError(`Filename longer than ${MAX_NAME_LENGTH} characters`, stage);
    }
    if (FORBIDDEN_CHARS.test(candidate)) {
      throw invalidNameError("Invalid filename", stage);
    }
    if (candidate === "." || candidate === ".." || candidate.trim() !== candidate) {
      throw invalidNameError("Invalid filename", stage);
    }
    if (candidate.startsWith(".")) {
      throw invalidNameError("Hidden files are not allowed", stage);
    }
    if (!this.isInsideRoot(candidate)) {
      throw invalidNameError("Invalid file path", stage);
    }
    return candidate;
  }

  /** Resolves a sanitized name to its absolute location under the root. */
  resolve(safeName: string): string {
    return path.join(this.root, safeName);
  }

  private isInsideRoot(name: string): boolean {
    const joined = path.resolve(this.root, name);
    const rel = path.relative(this.root, joined);
    return (
      rel.length > 0 &&
      !rel.startsWith("..") &&
      !path.isAbsolute(rel) &&
      path.dirname(joined) === this.root
    );
  }
}
