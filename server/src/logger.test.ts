import { describe, expect, it } from "vitest";
import { redactEmail } from "./logger.js";

describe("redactEmail", () => {
  it("keeps the first letter and the domain", () => {
    expect(redactEmail("ada@example.com")).toBe("a***@example.com");
    expect(redactEmail(" jo@example.com ")).toBe("**@example.com");
  });

  it("marks values that are not addresses", () => {
    expect(redactEmail("")).toBe("(invalid)");
    expect(redactEmail("nobody")).toBe("(invalid)");
    expect(redactEmail("ada@")).toBe("(invalid)");
  });
});
