import { describe, expect, it } from "vitest";
import { isSensitiveHeader, redactHeaders, REDACTION_TOKEN } from "../src/redaction.js";

describe("redactHeaders", () => {
  it("masks every value of credential headers", () => {
    const headers = {
      authorization: ["Bearer test-secret"],
      cookie: ["a=1", "b=2"],
      "x-api-key": ["test-key"],
      accept: ["application/json"],
    };

    expect(redactHeaders(headers)).toEqual({
      authorization: [REDACTION_TOKEN],
      cookie: [REDACTION_TOKEN, REDACTION_TOKEN],
      "x-api-key": [REDACTION_TOKEN],
      accept: ["application/json"],
    });
    expect(headers.authorization).toEqual(["Bearer test-secret"]);
  });

  it("matches names case-insensitively", () => {
    expect(isSensitiveHeader("X-Auth-Token")).toBe(true);
    expect(isSensitiveHeader("X-Client-Secret")).toBe(true);
    expect(isSensitiveHeader("Content-Type")).toBe(false);
  });
});
