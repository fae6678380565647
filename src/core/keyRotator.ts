/**
 * Round-robin credential rotator.
 * The pool is fixed at construction; rotation is global across all owners.
 *
 * Every dispatch calls next() synchronously before it awaits the upstream
 * call, so no two dispatches can read the same cursor value on the event loop.
 * Moving dispatch off the main thread would need an atomic increment here.
 */
import { ConfigurationError } from "../config/env.js";

export class KeyRotator {
  private readonly pool: readonly string[];
  private index = 0;

  constructor(keys: readonly string[]) {
    const pool = keys.map((k) => k.trim()).filter(Boolean);
    if (pool.length === 0) {
      throw new ConfigurationError("Credential pool is empty");
    }
    this.pool = pool;
  }

  /** Returns the credential under the cursor and advances it. */
  next(): string {
    const key = this.pool[this.index];
    this.index = (this.index + 1) % this.pool.length;
    return key;
  }

  get size(): number {
    return this.pool.length;
  }

  get cursor(): number {
    return this.index;
  }
}
