import { describe, expect, it } from "vitest";
import { ForbiddenError } from "../modules/errors.js";
import { extractBearerToken } from "./auth.js";

describe("extractBearerToken", () => {
  it("returns the token of a bearer header", () => {
    expect(extractBearerToken("Bearer abc123")).toBe("abc123");
    expect(extractBearerToken("  Bearer   abc123 ")).toBe("abc123");
  });

  it.each([
    [undefined, "authorization.not_set"],
    ["", "authorization.not_set"],
    ["Bearer", "authorization.scheme_unrecognised"],
    ["Bearer a b", "authorization.scheme_unrecognised"],
    ["bearer abc", "authorization.scheme_invalid"],
    ["Basic abc", "authorization.scheme_invalid"],
  ])("rejects %j with %s", (header, key) => {
    let caught: unknown;
    try {
      extractBearerToken(header);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ForbiddenError);
    expect(caught).toMatchObject({ statusCode: 403, key });
  });
});
