import type { ViewMode, ViewStackFrame } from "@tailscope/contracts";

/**
 * Ancestors of the active view. The active mode itself is not on the stack, so popping
 * returns to whatever was underneath and an empty stack means we are on a base view.
 */
export class ViewStack {
  private readonly frames: ViewStackFrame[] = [];
  private active: ViewMode;

  constructor(initial: ViewMode) {
    this.active = initial;
  }

  get current(): ViewMode {
    return this.active;
  }

  get depth(): number {
    return this.frames.length;
  }

  push(mode: ViewMode): void {
    this.frames.push({ mode: this.active });
    this.active = mode;
  }

  pop(): boolean {
    const frame = this.frames.pop();
    if (!frame) return false;
    this.active = frame.mode;
    return true;
  }

  /** The view underneath the active one, or the active one itself on a base view. */
  peek(): ViewMode {
    return this.frames[this.frames.length - 1]?.mode ?? this.active;
  }

  clear(): void {
    this.frames.length = 0;
  }

  /** Lateral move between base views; drops every ancestor. */
  replaceBase(mode: ViewMode): void {
    this.clear();
    this.active = mode;
  }

  /** Sets the active mode without recording the previous one. */
  set(mode: ViewMode): void {
    this.active = mode;
  }

  contains(mode: ViewMode): boolean {
    return this.active === mode || this.frames.some((frame) => frame.mode === mode);
  }

  snapshot(): ViewMode[] {
    return this.frames.map((frame) => frame.mode);
  }
}
