/**
 * Holds sensitive bytes (tokens, secret values) in a Buffer that can be
 * overwritten once it is no longer needed.
 *
 * JavaScript strings are immutable and cannot be cleared, so the value is
 * only materialised as a string inside `use()`, for the duration of the
 * callback. `toString()` and `toJSON()` never reveal the contents.
 */
export class SecretBuffer {
  private bytes: Buffer;
  private zeroed = false;

  private constructor(bytes: Buffer) {
    this.bytes = bytes;
  }

  static from(value: string): SecretBuffer {
    return new SecretBuffer(Buffer.from(value, "utf8"));
  }

  /** Takes ownership of `bytes`; the caller must not keep using it. */
  static adopt(bytes: Buffer): SecretBuffer {
    return new SecretBuffer(bytes);
  }

  get isZeroed(): boolean {
    return this.zeroed;
  }

  get byteLength(): number {
    return this.bytes.length;
  }

  use<T>(fn: (value: string) => T): T {
    if (this.zeroed) {
      throw new Error("Secret buffer has already been cleared");
    }
    return fn(this.bytes.toString("utf8"));
  }

  /** Copies into a buffer the caller owns and must zero. */
  copy(): SecretBuffer {
    if (this.zeroed) {
      throw new Error("Secret buffer has already been cleared");
    }
    return new SecretBuffer(Buffer.from(this.bytes));
  }

  equals(other: SecretBuffer): boolean {
    if (this.zeroed || other.zeroed) return false;
    return this.bytes.equals(other.bytes);
  }

  zero(): void {
    if (this.zeroed) return;
    this.bytes.fill(0);
    this.bytes = Buffer.alloc(0);
    this.zeroed = true;
  }

  toString(): string {
    return "[SecretBuffer]";
  }

  toJSON(): string {
    return "[SecretBuffer]";
  }
}

/** Runs `fn` with `secret` and zeroes it afterwards, whatever the outcome. */
export async function withSecret<T>(
  secret: SecretBuffer,
  fn: (secret: SecretBuffer) => Promise<T>
): Promise<T> {
  try {
    return await fn(secret);
  } finally {
    secret.zero();
  }
}
