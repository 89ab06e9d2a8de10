/** Scrollable block of pre-rendered text for the detail, error, help and chat views. */
export class Viewport {
  private lines: string[] = [];
  offset = 0;

  constructor(
    public width = 80,
    public height = 20,
  ) {}

  get content(): string {
    return this.lines.join("\n");
  }

  get lineCount(): number {
    return this.lines.length;
  }

  setContent(content: string): void {
    this.lines = content.split("\n");
    this.offset = Math.min(this.offset, this.maxOffset());
  }

  resize(width: number, height: number): void {
    this.width = Math.max(1, width);
    this.height = Math.max(1, height);
    this.offset = Math.min(this.offset, this.maxOffset());
  }

  private maxOffset(): number {
    return Math.max(0, this.lines.length - this.height);
  }

  scrollBy(delta: number): void {
    this.offset = Math.min(Math.max(0, this.offset + delta), this.maxOffset());
  }

  gotoTop(): void {
    this.offset = 0;
  }

  gotoBottom(): void {
    this.offset = this.maxOffset();
  }

  visibleLines(): string[] {
    return this.lines.slice(this.offset, this.offset + this.height);
  }

  atBottom(): boolean {
    return this.offset >= this.maxOffset();
  }
}

/** Shared scroll keys for viewport views. Returns false when the key is not a scroll key. */
export function viewportScroll(viewport: Viewport, key: string): boolean {
  const half = Math.max(1, Math.floor(viewport.height / 2));
  switch (key) {
    case "j":
    case "down":
      viewport.scrollBy(1);
      return true;
    case "k":
    case "up":
      viewport.scrollBy(-1);
      return true;
    case "d":
    case "pgdown":
      viewport.scrollBy(half);
      return true;
    case "u":
    case "pgup":
      viewport.scrollBy(-half);
      return true;
    case "g":
    case "home":
      viewport.gotoTop();
      return true;
    case "G":
    case "end":
      viewport.gotoBottom();
      return true;
    default:
      return false;
  }
}
