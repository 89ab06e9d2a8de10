import type { KeyEvent, MouseEvent } from "@tailscope/contracts";

export type InputEvent = KeyEvent | MouseEvent;

const SGR_MOUSE = /^\x1b\[<(\d+);(\d+);(\d+)([Mm])/;
const CSI = /^\x1b\[(\d*)(?:;\d+)*([A-Za-z~])/;
const SS3 = /^\x1bO([A-DHF])/;

const CSI_LETTERS: Readonly<Record<string, string>> = {
  A: "up",
  B: "down",
  C: "right",
  D: "left",
  H: "home",
  F: "end",
  Z: "shift+tab",
};

const CSI_TILDE: Readonly<Record<string, string>> = {
  "1": "home",
  "7": "home",
  "3": "delete",
  "4": "end",
  "8": "end",
  "5": "pgup",
  "6": "pgdown",
};

function key(name: string): KeyEvent {
  return { type: "key", key: name };
}

function mouseEvent(button: number, x: number, y: number, pressed: boolean): MouseEvent | null {
  // SGR reports 1-based cells.
  const col = x - 1;
  const row = y - 1;
  if (button === 64) return { type: "mouse", action: "wheelUp", x: col, y: row };
  if (button === 65) return { type: "mouse", action: "wheelDown", x: col, y: row };
  if (button === 0 && pressed) return { type: "mouse", action: "click", x: col, y: row };
  return null;
}

function controlKey(code: number): string {
  if (code === 13 || code === 10) return "enter";
  if (code === 9) return "tab";
  if (code === 8 || code === 127) return "backspace";
  return `ctrl+${String.fromCharCode(code + 96)}`;
}

/** Splits one chunk of raw terminal input into key and mouse events. */
export function parseInput(data: string): InputEvent[] {
  const events: InputEvent[] = [];
  let rest = data;
  while (rest.length > 0) {
    if (rest.startsWith("\x1b")) {
      const mouse = SGR_MOUSE.exec(rest);
      if (mouse) {
        const event = mouseEvent(Number(mouse[1]), Number(mouse[2]), Number(mouse[3]), mouse[4] === "M");
        if (event) events.push(event);
        rest = rest.slice(mouse[0].length);
        continue;
      }
      const csi = CSI.exec(rest);
      if (csi) {
        const name = csi[2] === "~" ? CSI_TILDE[csi[1]] : CSI_LETTERS[csi[2]];
        if (name) events.push(key(name));
        rest = rest.slice(csi[0].length);
        continue;
      }
      const ss3 = SS3.exec(rest);
      if (ss3) {
        events.push(key(CSI_LETTERS[ss3[1]] ?? "esc"));
        rest = rest.slice(ss3[0].length);
        continue;
      }
      events.push(key("esc"));
      rest = rest.slice(1);
      continue;
    }

    const codePoint = rest.codePointAt(0) ?? 0;
    const char = String.fromCodePoint(codePoint);
    rest = rest.slice(char.length);
    if (codePoint === 32) {
      events.push(key("space"));
    } else if (codePoint < 32 || codePoint === 127) {
      events.push(key(controlKey(codePoint)));
    } else {
      events.push(key(char));
    }
  }
  return events;
}
