import { describe, expect, it } from "vitest";
import { listNav, SelectionModel } from "./selection.js";

describe("SelectionModel", () => {
  it("clamps into bounds and reports real changes only", () => {
    const selection = new SelectionModel(5);
    expect(selection.setSelectedIndex(10)).toBe(true);
    expect(selection.selectedIndex).toBe(4);
    expect(selection.userHasScrolled).toBe(true);

    selection.resetScroll();
    expect(selection.setSelectedIndex(4)).toBe(false);
    expect(selection.userHasScrolled).toBe(false);
  });

  it("forces index 0 on an empty list", () => {
    const selection = new SelectionModel(0);
    expect(selection.setSelectedIndex(3)).toBe(false);
    expect(selection.selectedIndex).toBe(0);
    expect(selection.userHasScrolled).toBe(false);
  });

  it("does not move or mark scrolling at the top boundary", () => {
    const selection = new SelectionModel(3);
    expect(selection.moveSelection(-1)).toBe(false);
    expect(selection.selectedIndex).toBe(0);
    expect(selection.userHasScrolled).toBe(false);

    expect(selection.moveSelection(1)).toBe(true);
    expect(selection.userHasScrolled).toBe(true);
  });

  it("follows the newest entry for either sort order", () => {
    const selection = new SelectionModel();
    selection.applyTail(5, false);
    expect(selection.selectedIndex).toBe(0);

    selection.applyTail(5, true);
    expect(selection.selectedIndex).toBe(4);
    expect(selection.userHasScrolled).toBe(false);
  });

  it("preserves a manual position but still clamps when the list shrinks", () => {
    const selection = new SelectionModel(10);
    selection.setSelectedIndex(7);
    selection.applyTail(10, false);
    expect(selection.selectedIndex).toBe(7);

    selection.applyTail(3, false);
    expect(selection.selectedIndex).toBe(2);
    expect(selection.userHasScrolled).toBe(true);
  });

  it("resumes following after a filter change", () => {
    const selection = new SelectionModel();
    selection.applyTail(5, false);
    selection.moveSelection(1);
    selection.moveSelection(1);
    selection.moveSelection(1);
    expect(selection.selectedIndex).toBe(3);
    expect(selection.userHasScrolled).toBe(true);

    selection.resetScroll();
    selection.applyTail(2, false);
    expect(selection.selectedIndex).toBe(0);
  });

  it("resets to zero when the list empties", () => {
    const selection = new SelectionModel(4);
    selection.setSelectedIndex(3);
    selection.clamp(0);
    expect(selection.selectedIndex).toBe(0);
  });
});

describe("listNav", () => {
  it("moves by one, by a page and to either end", () => {
    expect(listNav(0, 30, "down")).toBe(1);
    expect(listNav(0, 30, "j")).toBe(1);
    expect(listNav(0, 30, "up")).toBe(0);
    expect(listNav(5, 30, "pgdown")).toBe(15);
    expect(listNav(25, 30, "pgdown")).toBe(29);
    expect(listNav(5, 30, "pgup")).toBe(0);
    expect(listNav(12, 30, "g")).toBe(0);
    expect(listNav(12, 30, "G")).toBe(29);
  });

  it("returns -1 for other keys", () => {
    expect(listNav(3, 10, "enter")).toBe(-1);
    expect(listNav(0, 0, "x")).toBe(-1);
    expect(listNav(0, 0, "down")).toBe(0);
  });
});
