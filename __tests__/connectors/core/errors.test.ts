import { describe, expect, it } from "vitest";
import {
  ConfigError,
  errorMessage,
  isRetryable,
  TransientFetchError,
} from "../../../src/connectors/core/errors.js";

describe("errorMessage", () => {
  it("uses the message of an Error", () => {
    expect(errorMessage(new TypeError("terminated"))).toBe("terminated");
  });

  it("stringifies anything else", () => {
    expect(errorMessage("boom")).toBe("boom");
    expect(errorMessage(42)).toBe("42");
    expect(errorMessage(null)).toBe("null");
  });
});

describe("isRetryable", () => {
  it("is true only for transient fetch errors", () => {
    expect(isRetryable(new TransientFetchError({ message: "Server error (503)", status: 503 }))).toBe(true);
    expect(isRetryable(new ConfigError(["api_key: is required"]))).toBe(false);
    expect(isRetryable(new Error("boom"))).toBe(false);
  });
});
