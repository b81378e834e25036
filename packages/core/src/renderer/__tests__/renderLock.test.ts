import { assert, describe, test } from "@styledtext/testkit";
import { StyledTextError } from "../../errors.js";
import { RenderLock } from "../renderLock.js";

describe("render lock", () => {
  test("returns the guarded result and releases", () => {
    const lock = new RenderLock();
    assert.equal(
      lock.run("size", () => 42),
      42,
    );
    assert.equal(lock.held, false);
  });

  test("re-entry throws and names the holder", () => {
    const lock = new RenderLock();
    assert.throws(
      () => lock.run("render", () => lock.run("size", () => 0)),
      (err: unknown) =>
        err instanceof StyledTextError &&
        err.code === "STX_REENTRANT_CALL" &&
        err.message === "size: re-entrant call while render holds the renderer lock",
    );
    assert.equal(lock.held, false);
  });

  test("releases when the guarded work throws", () => {
    const lock = new RenderLock();
    assert.throws(() =>
      lock.run("size", () => {
        throw new Error("boom");
      }),
    );
    assert.equal(lock.held, false);
    assert.equal(
      lock.run("size", () => "ok"),
      "ok",
    );
  });
});
