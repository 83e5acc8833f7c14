import { randomBytes } from "node:crypto";

/** Character class every generated stored name satisfies. */
export const STORED_NAME_PATTERN = /^[A-Za-z0-9_-]+(\.[a-z0-9]+)?$/;

const EXTENSION_PATTERN = /^[a-z0-9]{1,16}$/;
const FRAGMENT_MAX = 8;
// 6 bytes = 48 bits of randomness per name.
const TOKEN_BYTES = 6;

/**
 * Returns the lower-cased extension of `originalName` (text after the final
 * dot), or "" when there is none or it falls outside [a-z0-9]{1,16}.
 */
export function extractExtension(originalName: string): string {
  const base = baseName(originalName);
  const dot = base.lastIndexOf(".");
  if (dot <= 0) return "";
  const ext = base.slice(dot + 1).toLowerCase();
  return EXTENSION_PATTERN.test(ext) ? ext : "";
}

function baseName(name: string): string {
  const parts = name.split(/[/\\]/);
  return parts[parts.length - 1] ?? "";
}

function stemFragment(originalName: string): string {
  const base = baseName(originalName);
  const dot = base.lastIndexOf(".");
  const stem = dot > 0 ? base.slice(0, dot) : base;
  return stem.replace(/[^A-Za-z0-9_-]/g, "").slice(0, FRAGMENT_MAX);
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

/** UTC time as YYYYMMDDHHmmssSSS, so names sort by creation. */
export function timePrefix(now: Date): string {
  return (
    `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}` +
    `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}` +
    pad(now.getUTCMilliseconds(), 3)
  );
}

export class NameGenerator {
  private readonly clock: () => Date;

  constructor(clock: () => Date = () => new Date()) {
    this.clock = clock;
  }

  /** `<time>_<token>[_<fragment>][.<ext>]`; nothing of the original is kept verbatim. */
  generate(originalName: string): string {
    const token = randomBytes(TOKEN_BYTES).toString("hex");
    const fragment = stemFragment(originalName);
    const ext = extractExtension(originalName);

    let name = `${timePrefix(this.clock())}_${token}`;
    if (fragment) name += `_${fragment}`;
    if (ext) name += `.${ext}`;
    return name;
  }
}
