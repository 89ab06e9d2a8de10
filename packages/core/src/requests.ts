import type { RequestKind } from "@tailscope/contracts";

export interface RequestHandle {
  id: number;
  signal: AbortSignal;
  /** Releases the handle. Safe to call more than once; never touches a newer request of the same kind. */
  done: () => void;
}

interface RequestState {
  id: number;
  controller: AbortController;
}

function timeoutReason(kind: RequestKind, timeoutMs: number): Error {
  const error = new Error(`${kind} request timed out after ${timeoutMs}ms`);
  error.name = "TimeoutError";
  return error;
}

function supersededReason(kind: RequestKind): Error {
  const error = new Error(`${kind} request superseded`);
  error.name = "AbortError";
  return error;
}

/**
 * Hands out one cancellation handle per request kind. Starting a request aborts whatever was
 * in flight for the same kind, so at most one request per kind is ever current.
 */
export class RequestTracker {
  private readonly states = new Map<RequestKind, RequestState>();
  private seq = 0;

  constructor(private readonly parent?: AbortSignal) {}

  startRequest(kind: RequestKind, timeoutMs: number): RequestHandle {
    this.states.get(kind)?.controller.abort(supersededReason(kind));

    this.seq += 1;
    const id = this.seq;
    const controller = new AbortController();

    const onParentAbort = () => controller.abort(this.parent?.reason);
    if (this.parent?.aborted) {
      controller.abort(this.parent.reason);
    } else {
      this.parent?.addEventListener("abort", onParentAbort, { once: true });
    }

    const timer = timeoutMs > 0 ? setTimeout(() => controller.abort(timeoutReason(kind, timeoutMs)), timeoutMs) : null;

    this.states.set(kind, { id, controller });

    let released = false;
    const done = () => {
      if (released) return;
      released = true;
      if (timer) clearTimeout(timer);
      this.parent?.removeEventListener("abort", onParentAbort);
      if (!controller.signal.aborted) {
        controller.abort(supersededReason(kind));
      }
      if (this.states.get(kind)?.id === id) {
        this.states.delete(kind);
      }
    };

    return { id, signal: controller.signal, done };
  }

  isCurrent(kind: RequestKind, id: number): boolean {
    return this.states.get(kind)?.id === id;
  }

  has(kind: RequestKind): boolean {
    return this.states.has(kind);
  }

  cancel(kind: RequestKind): void {
    const state = this.states.get(kind);
    if (!state) return;
    state.controller.abort(supersededReason(kind));
    this.states.delete(kind);
  }

  cancelAll(): void {
    for (const kind of Array.from(this.states.keys())) {
      this.cancel(kind);
    }
  }

  get size(): number {
    return this.states.size;
  }
}
