import { describe, it, expect } from "vitest";
import { err, fromNullable, none, ok, some, unwrap } from "../src/result/result.js";

describe("result", () => {
  it("wraps possibly-undefined values", () => {
    expect(fromNullable(0)).toEqual(some(0));
    expect(fromNullable(null)).toEqual(some(null));
    expect(fromNullable(undefined)).toEqual(none());
  });

  it("unwraps successes and throws on failures", () => {
    expect(unwrap(ok("value"))).toBe("value");
    expect(() => unwrap(err({ type: "unknownEntity", id: "Q" }))).toThrow(
      'Unwrapped a failed result: {"type":"unknownEntity","id":"Q"}'
    );
  });
});
