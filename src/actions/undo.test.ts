import { describe, it, expect } from "vitest";
import { undoAllReposts } from "./undo";
import { FakeElement, FakePage, testConfig } from "../testing/fake-browser";
import { silentLogger } from "../logging/logger";
import { PROFILE } from "../selectors";

function profilePage(buttons: FakeElement[], confirm: FakeElement | null = new FakeElement()): FakePage {
  const page = new FakePage()
    .define(PROFILE.ready, [new FakeElement()])
    // Undone reposts drop their undo button
    .define(PROFILE.undoButton, () => buttons.filter((b) => b.clicks === 0));
  if (confirm) page.define(PROFILE.undoConfirm, [confirm]);
  return page;
}

describe("undoAllReposts", () => {
  it("undoes every visible repost and stops when none are left", async () => {
    const buttons = [new FakeElement(), new FakeElement(), new FakeElement()];
    const confirm = new FakeElement();
    const page = profilePage(buttons, confirm);

    expect(await undoAllReposts(page, testConfig(), silentLogger)).toBe(3);
    expect(buttons.map((b) => b.clicks)).toEqual([1, 1, 1]);
    expect(confirm.clicks).toBe(3);
    expect(page.scrollSteps).toBe(1);
  });

  it("stops when a round undoes nothing", async () => {
    const buttons = [new FakeElement(), new FakeElement()];
    const page = profilePage(buttons, null);

    expect(await undoAllReposts(page, testConfig(), silentLogger)).toBe(0);
    expect(page.scrollSteps).toBe(0);
  });

  it("keeps going past a button that throws", async () => {
    const stuck = new FakeElement({ clickError: new Error("detached") });
    const page = profilePage([stuck, new FakeElement(), new FakeElement()]);

    expect(await undoAllReposts(page, testConfig(), silentLogger)).toBe(2);
    expect(page.scrollSteps).toBe(1);
  });

  it("returns 0 on a profile with no reposts", async () => {
    expect(await undoAllReposts(profilePage([]), testConfig(), silentLogger)).toBe(0);
  });
});
