import { describe, expect, test } from "vitest";
import { isReadStreamError, ReadStreamError } from "./errors.js";

describe("ReadStreamError", () => {
  test("prefixes the message with the code", () => {
    const e = new ReadStreamError({ code: "no_more_data", message: "wanted 4 bytes, got 1" });
    expect(e.message).toBe("no_more_data: wanted 4 bytes, got 1");
    expect(e.name).toBe("ReadStreamError");
    expect(e.code).toBe("no_more_data");
    expect(e).toBeInstanceOf(Error);
  });

  test("uses the bare code without a message", () => {
    expect(new ReadStreamError({ code: "delimiters_not_found" }).message).toBe("delimiters_not_found");
  });

  test("keeps the cause", () => {
    const cause = new Error("boom");
    const e = new ReadStreamError({ code: "invalid_source_result", cause });
    expect(e.cause).toBe(cause);
  });

  test("isReadStreamError optionally checks the code", () => {
    const e = new ReadStreamError({ code: "read_size_limit_reached" });
    expect(isReadStreamError(e)).toBe(true);
    expect(isReadStreamError(e, "read_size_limit_reached")).toBe(true);
    expect(isReadStreamError(e, "no_more_data")).toBe(false);
    expect(isReadStreamError(new Error("read_size_limit_reached"))).toBe(false);
  });
});
