import { describe, expect, it } from "vitest";
import { isTransientError, ProviderHttpError, untilAborted } from "./http";

describe("isTransientError", () => {
  it.each([
    [new ProviderHttpError(503, "unavailable"), true],
    [new ProviderHttpError(500, "internal"), true],
    [new ProviderHttpError(429, "throttled"), true],
    [new ProviderHttpError(401, "unauthorized"), false],
    [new ProviderHttpError(400, "bad request"), false],
    [new TypeError("fetch failed"), true],
    [Object.assign(new Error("The operation was aborted due to timeout"), { name: "TimeoutError" }), true],
    [Object.assign(new Error("This operation was aborted"), { name: "AbortError" }), false],
    [new Error("unexpected"), false],
  ])("should classify %s", (error, expected) => {
    expect(isTransientError(error)).toBe(expected);
  });
});

describe("untilAborted", () => {
  it("should resolve with the underlying value", async () => {
    const controller = new AbortController();
    await expect(untilAborted(Promise.resolve(42), controller.signal)).resolves.toBe(42);
  });

  it("should reject with the abort reason while the underlying work continues", async () => {
    const controller = new AbortController();
    let finish: (value: string) => void = () => {};
    const work = new Promise<string>((resolve) => {
      finish = resolve;
    });

    const waiting = untilAborted(work, controller.signal);
    controller.abort(new Error("client left"));
    await expect(waiting).rejects.toThrow("client left");

    finish("done");
    await expect(work).resolves.toBe("done");
  });

  it("should reject immediately for an already aborted signal", async () => {
    const controller = new AbortController();
    controller.abort(new Error("too late"));
    await expect(untilAborted(Promise.resolve(1), controller.signal)).rejects.toThrow(
      "too late",
    );
  });
});
