import { describe, test, expect } from "vitest";
import { describeError } from "../../../src/cli/utils/error-handler.js";
import { VisualizeCommandOptionsSchema } from "../../../src/cli/utils/validation.js";

describe("describeError", () => {
  test("names the failing option", () => {
    const result = VisualizeCommandOptionsSchema.safeParse({ limit: "0" });
    if (result.success) {
      throw new Error("expected a validation failure");
    }

    expect(describeError(result.error)).toBe(
      'Invalid option "limit": Number must be greater than or equal to 1'
    );
  });

  test("uses the message of ordinary errors", () => {
    expect(describeError(new Error("File not found: /data/movies.csv"))).toBe("File not found: /data/movies.csv");
  });

  test("stringifies anything else", () => {
    expect(describeError(42)).toBe("42");
  });
});
