import { createHash, randomBytes, timingSafeEqual } from "node:crypto";

function digest(value: string): Buffer {
  return createHash("sha256").update(value, "utf8").digest();
}

/**
 * Checks a submitted secret against the configured upload password.
 *
 * Both sides are hashed to fixed-length digests before `timingSafeEqual`, so
 * neither the length of the secret nor the position of the first differing
 * byte shows in the timing. With no secret configured the submitted value is
 * still hashed and compared (against a random digest) and the result is
 * always false.
 */
export class Authenticator {
  private readonly expected: Buffer;
  private readonly configured: boolean;

  constructor(secret: string | undefined) {
    this.configured = typeof secret === "string" && secret.length > 0;
    this.expected = this.configured && secret ? digest(secret) : randomBytes(32);
  }

  get hasSecret(): boolean {
    return this.configured;
  }

  verify(submitted: string | null | undefined): boolean {
    const given = digest(submitted ?? "");
    const match = timingSafeEqual(given, this.expected);
    return this.configured && match;
  }
}
