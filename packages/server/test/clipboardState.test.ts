import { describe, it } from "node:test";
import assert from "node:assert";
import { ClipboardState } from "../src/clipboardState";
import { ERROR_CODES } from "../src/errors";
import { createClock } from "./helpers";

describe("ClipboardState", () => {
  it("should start empty at version 0 with no author", () => {
    const state = new ClipboardState({ maxTextSizeBytes: 64, now: () => 500 });

    assert.deepStrictEqual(state.current(), {
      content: "",
      version: 0,
      updatedAt: 500,
      updatedBy: null,
    });
  });

  it("should accept an update at the current version and bump it", () => {
    const clock = createClock(100);
    const state = new ClipboardState({ maxTextSizeBytes: 64, now: clock.now });

    clock.set(200);
    const result = state.update("hello", 0, "a");

    assert.ok(result.ok);
    assert.deepStrictEqual(result.value, {
      content: "hello",
      version: 1,
      updatedAt: 200,
      updatedBy: "a",
    });
    assert.deepStrictEqual(state.current(), result.value);
  });

  it("should reject a stale version without mutating state", () => {
    const state = new ClipboardState({ maxTextSizeBytes: 64, now: () => 1 });
    state.update("hello", 0, "a");

    const result = state.update("world", 0, "b");

    assert.strictEqual(result.ok, false);
    if (result.ok) return;
    const error = result.error;
    assert.strictEqual(error.code, ERROR_CODES.STALE_VERSION);
    if (error.code !== ERROR_CODES.STALE_VERSION) return;
    assert.strictEqual(error.current.version, 1);
    assert.strictEqual(error.current.content, "hello");
    assert.strictEqual(state.current().content, "hello");
    assert.strictEqual(state.current().version, 1);
  });

  it("should reject a version from the future", () => {
    const state = new ClipboardState({ maxTextSizeBytes: 64 });

    const result = state.update("ahead", 5, "a");

    assert.strictEqual(result.ok, false);
    assert.strictEqual(state.current().version, 0);
  });

  it("should never decrease the version across a mixed sequence of updates", () => {
    const state = new ClipboardState({ maxTextSizeBytes: 64 });
    const attempts: Array<[string, number]> = [
      ["one", 0],
      ["stale", 0],
      ["two", 1],
      ["future", 9],
      ["three", 2],
      ["stale again", 1],
    ];

    let previous = state.current().version;
    const accepted: string[] = [];
    for (const [content, version] of attempts) {
      const result = state.update(content, version, "writer");
      if (result.ok) accepted.push(content);
      const next = state.current().version;
      assert.ok(next >= previous);
      previous = next;
    }

    assert.deepStrictEqual(accepted, ["one", "two", "three"]);
    assert.strictEqual(state.current().version, 3);
    assert.strictEqual(state.current().content, "three");
  });

  it("should measure the size limit in UTF-8 bytes", () => {
    const state = new ClipboardState({ maxTextSizeBytes: 4 });

    // "éé" is 4 bytes, "ééé" is 6.
    assert.ok(state.update("éé", 0, "a").ok);
    const result = state.update("ééé", 1, "a");

    assert.strictEqual(result.ok, false);
    if (result.ok) return;
    assert.deepStrictEqual(result.error, {
      code: ERROR_CODES.PAYLOAD_TOO_LARGE,
      limitBytes: 4,
      actualBytes: 6,
      message: "Text is 6 bytes; the limit is 4",
    });
    assert.strictEqual(state.current().content, "éé");
    assert.strictEqual(state.current().version, 1);
  });

  it("should return copies that callers cannot mutate", () => {
    const state = new ClipboardState({ maxTextSizeBytes: 64 });
    const snapshot = state.current();
    snapshot.content = "tampered";

    assert.strictEqual(state.current().content, "");
  });

  it("should stamp a trimmed author name and drop a blank one", () => {
    const state = new ClipboardState({ maxTextSizeBytes: 64, now: () => 7 });

    const named = state.update("hi", 0, "a", "  Desk  ");
    assert.ok(named.ok);
    assert.deepStrictEqual(named.value, {
      content: "hi",
      version: 1,
      updatedAt: 7,
      updatedBy: "a",
      updatedByName: "Desk",
    });

    const blank = state.update("again", 1, "b", "   ");
    assert.ok(blank.ok);
    assert.strictEqual("updatedByName" in blank.value, false);
  });

  it("should clear to empty text as a new version", () => {
    const state = new ClipboardState({ maxTextSizeBytes: 64, now: () => 9 });
    assert.ok(state.update("hello", 0, "a").ok);

    const cleared = state.clear("b");

    assert.deepStrictEqual(cleared, { content: "", version: 2, updatedAt: 9, updatedBy: "b" });
    assert.strictEqual(state.update("late", 1, "a").ok, false);
  });
});
