/**
 * Re-entrancy guard.
 *
 * An explicit lock token is acquired before any operation that can hand
 * control to an external party and released on every exit path. A nested
 * attempt to acquire while the token is held fails with ReentrantCall.
 */

import { AccessErrors } from "../errors";

export interface LockToken {
  readonly id: number;
  readonly operation: string;
}

export class ReentrancyGuard {
  private held: LockToken | null = null;
  private nextId = 1;

  get isLocked(): boolean {
    return this.held !== null;
  }

  /** Operation currently holding the lock, if any. */
  get holder(): string | null {
    return this.held?.operation ?? null;
  }

  acquire(operation: string): LockToken {
    if (this.held) {
      throw AccessErrors.reentrantCall(operation, this.held.operation);
    }
    const token: LockToken = { id: this.nextId++, operation };
    this.held = token;
    return token;
  }

  release(token: LockToken): void {
    if (!this.held || this.held.id !== token.id) {
      throw new Error(`Lock token ${token.id} (${token.operation}) is not the current holder`);
    }
    this.held = null;
  }

  /** Run `fn` while holding the lock. */
  run<T>(operation: string, fn: () => T): T {
    const token = this.acquire(operation);
    try {
      return fn();
    } finally {
      this.release(token);
    }
  }
}
