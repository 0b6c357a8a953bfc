import { describe, expect, test } from "vitest";
import { CancellationSource, toCancellationCheck } from "./cancellation";

describe("toCancellationCheck", () => {
  test("never cancels without input", () => {
    expect(toCancellationCheck()()).toBe(false);
  });

  test("wraps tokens, functions and abort signals", () => {
    const source = new CancellationSource();
    const fromToken = toCancellationCheck(source);
    expect(fromToken()).toBe(false);
    source.cancel();
    expect(fromToken()).toBe(true);

    let flag = false;
    const fromFunction = toCancellationCheck(() => flag);
    flag = true;
    expect(fromFunction()).toBe(true);

    const controller = new AbortController();
    const fromSignal = toCancellationCheck(controller.signal);
    expect(fromSignal()).toBe(false);
    controller.abort();
    expect(fromSignal()).toBe(true);
  });
});
