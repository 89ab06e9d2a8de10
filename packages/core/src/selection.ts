export const LIST_PAGE_SIZE = 10;

/**
 * Cursor over the primary entry list. `userHasScrolled` is what suppresses tail-follow:
 * any real manual move sets it, filter changes clear it.
 */
export class SelectionModel {
  selectedIndex = 0;
  userHasScrolled = false;

  constructor(private length = 0) {}

  get size(): number {
    return this.length;
  }

  setLength(length: number): void {
    this.length = Math.max(0, length);
  }

  /** Returns whether the index actually changed; only a real change counts as manual scrolling. */
  setSelectedIndex(index: number): boolean {
    const next = this.length === 0 ? 0 : Math.min(Math.max(index, 0), this.length - 1);
    if (next === this.selectedIndex) return false;
    this.selectedIndex = next;
    this.userHasScrolled = true;
    return true;
  }

  moveSelection(delta: number): boolean {
    return this.setSelectedIndex(this.selectedIndex + delta);
  }

  /** Direct assignment to the newest entry; does not count as manual scrolling. */
  applyTail(length: number, sortAscending: boolean): void {
    this.setLength(length);
    if (!this.userHasScrolled && this.length > 0) {
      this.selectedIndex = sortAscending ? this.length - 1 : 0;
    }
    this.clamp(length);
  }

  clamp(length: number): void {
    this.setLength(length);
    if (this.length === 0) {
      this.selectedIndex = 0;
      return;
    }
    if (this.selectedIndex >= this.length) this.selectedIndex = this.length - 1;
    if (this.selectedIndex < 0) this.selectedIndex = 0;
  }

  resetScroll(): void {
    this.userHasScrolled = false;
  }

  /** Places the cursor without marking the move as manual, e.g. when restoring a position. */
  reset(index = 0): void {
    this.selectedIndex = index;
    this.clamp(this.length);
  }
}

/**
 * Navigation for the secondary lists (trace names, metrics, perspectives, fields). Returns the
 * new cursor, or -1 when the key is not a navigation key.
 */
export function listNav(cursor: number, length: number, key: string): number {
  if (length <= 0) {
    return isListNavKey(key) ? 0 : -1;
  }
  const last = length - 1;
  switch (key) {
    case "up":
    case "k":
      return Math.max(0, cursor - 1);
    case "down":
    case "j":
      return Math.min(last, cursor + 1);
    case "pgup":
      return Math.max(0, cursor - LIST_PAGE_SIZE);
    case "pgdown":
      return Math.min(last, cursor + LIST_PAGE_SIZE);
    case "home":
    case "g":
      return 0;
    case "end":
    case "G":
      return last;
    default:
      return -1;
  }
}

export function isListNavKey(key: string): boolean {
  return ["up", "k", "down", "j", "pgup", "pgdown", "home", "g", "end", "G"].includes(key);
}
