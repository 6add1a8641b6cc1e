import type { GameStateResponse } from "../shared/gameTypes.js";
import { GameError } from "./errors.js";

/**
 * Unbounded FIFO queue with a single consumer. `next()` resolves with the
 * oldest item, or with `undefined` once the mailbox is closed and drained.
 */
export class Mailbox<T> {
  private readonly items: T[] = [];
  private waiter?: (item: T | undefined) => void;
  private closed = false;

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.items.length;
  }

  push(item: T): boolean {
    if (this.closed) return false;
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter(item);
    } else {
      this.items.push(item);
    }
    return true;
  }

  next(): Promise<T | undefined> {
    const item = this.items.shift();
    if (item !== undefined) return Promise.resolve(item);
    if (this.closed) return Promise.resolve(undefined);
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  /** Closes the mailbox and returns whatever was still queued. */
  close(): T[] {
    this.closed = true;
    const pending = this.items.splice(0);
    const waiter = this.waiter;
    this.waiter = undefined;
    waiter?.(undefined);
    return pending;
  }
}

export type TurnReply =
  | { success: true; state: GameStateResponse }
  | { success: false; error: GameError };

interface PendingReply {
  requestId: number;
  resolve: (reply: TurnReply) => void;
  timer?: NodeJS.Timeout;
}

/**
 * Single-slot rendezvous between one waiting caller and the turn controller.
 * Only one request per player may be outstanding at a time.
 */
export class ReplySlot {
  private pending?: PendingReply;

  get busy(): boolean {
    return this.pending !== undefined;
  }

  isWaitingFor(requestId: number): boolean {
    return this.pending?.requestId === requestId;
  }

  open(requestId: number, timeoutMs: number): Promise<TurnReply> {
    if (this.pending) {
      throw new GameError("RequestInFlight", "A previous request from this player is still pending");
    }
    return new Promise<TurnReply>((resolve) => {
      const pending: PendingReply = { requestId, resolve };
      if (timeoutMs > 0) {
        pending.timer = setTimeout(() => {
          this.settle(requestId, {
            success: false,
            error: new GameError("Timeout", `No reply within ${timeoutMs}ms`)
          });
        }, timeoutMs);
      }
      this.pending = pending;
    });
  }

  fill(requestId: number, reply: TurnReply): boolean {
    return this.settle(requestId, reply);
  }

  cancel(error: GameError): void {
    if (this.pending) {
      this.settle(this.pending.requestId, { success: false, error });
    }
  }

  private settle(requestId: number, reply: TurnReply): boolean {
    const pending = this.pending;
    if (!pending || pending.requestId !== requestId) return false;
    if (pending.timer) clearTimeout(pending.timer);
    this.pending = undefined;
    pending.resolve(reply);
    return true;
  }
}
