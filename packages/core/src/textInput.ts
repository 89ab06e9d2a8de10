/** Single-line editor behind the search, index and chat prompts. */
export class TextInput {
  value = "";
  cursor = 0;
  focused = false;

  constructor(public placeholder = "") {}

  setValue(value: string): void {
    this.value = value;
    this.cursor = value.length;
  }

  focus(): void {
    this.focused = true;
  }

  blur(): void {
    this.focused = false;
  }

  reset(): void {
    this.setValue("");
  }

  /** Applies an editing key; returns false for keys the editor does not consume. */
  handleKey(key: string): boolean {
    switch (key) {
      case "backspace":
        if (this.cursor > 0) {
          this.value = this.value.slice(0, this.cursor - 1) + this.value.slice(this.cursor);
          this.cursor -= 1;
        }
        return true;
      case "delete":
        this.value = this.value.slice(0, this.cursor) + this.value.slice(this.cursor + 1);
        return true;
      case "left":
        this.cursor = Math.max(0, this.cursor - 1);
        return true;
      case "right":
        this.cursor = Math.min(this.value.length, this.cursor + 1);
        return true;
      case "home":
      case "ctrl+a":
        this.cursor = 0;
        return true;
      case "end":
      case "ctrl+e":
        this.cursor = this.value.length;
        return true;
      case "ctrl+u":
        this.value = this.value.slice(this.cursor);
        this.cursor = 0;
        return true;
      case "space":
        this.insert(" ");
        return true;
      default:
        if ([...key].length === 1) {
          this.insert(key);
          return true;
        }
        return false;
    }
  }

  private insert(text: string): void {
    this.value = this.value.slice(0, this.cursor) + text + this.value.slice(this.cursor);
    this.cursor += text.length;
  }
}
