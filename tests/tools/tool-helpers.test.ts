import { describe, it, expect } from "vitest";
import {
  AmbiguousReferenceError,
  BusinessRuleError,
  NotFoundError,
  PermissionDeniedError,
  RateLimitExceededError,
  TransientUpstreamError,
  UnexpectedResponseShapeError,
  ValidationError,
  WriteConfirmationError,
} from "../../src/api/index.js";
import { AuthenticationError } from "../../src/utils/errors.js";
import { describeError, errorResponse, toolResponse } from "../../src/tools/tool-helpers.js";

describe("toolResponse", () => {
  it("should wrap data as pretty-printed JSON text", () => {
    expect(toolResponse({ id: "a" })).toEqual({
      content: [{ type: "text", text: '{\n  "id": "a"\n}' }],
    });
  });

  it("should flag error results", () => {
    expect(errorResponse("nope")).toEqual({
      content: [{ type: "text", text: "nope" }],
      isError: true,
    });
  });
});

describe("describeError", () => {
  it("should warn against repeating a write whose confirmation failed", () => {
    const error = new WriteConfirmationError("create", "purchaseInvoice", "inv-1", new Error("timeout"));

    expect(describeError(error)).toBe(
      "The create of purchaseInvoice inv-1 was accepted by iplicit, but reading it back failed. " +
        "Do not repeat the change; fetch the record to check its state.",
    );
  });

  it("should include the last known status of a refused transition", () => {
    const error = new BusinessRuleError("Document is already posted", "document", "d1", "post", 160);

    expect(describeError(error)).toBe(
      "iplicit refused to post document d1 (current status: Posted): Document is already posted",
    );
  });

  it("should omit the status when it is unknown", () => {
    const error = new BusinessRuleError("Not allowed", "document", "d1", "reverse");

    expect(describeError(error)).toBe("iplicit refused to reverse document d1: Not allowed");
  });

  it("should list the candidates of an ambiguous code", () => {
    const error = new AmbiguousReferenceError("project", "p1", ["id-a", "id-b"]);

    expect(describeError(error)).toBe("'p1' matches 2 project records (id-a, id-b). Use the ID instead.");
  });

  it("should point at the search tools for an unknown code", () => {
    const error = new NotFoundError("Project with code 'X9' not found", "project", "X9");

    expect(describeError(error)).toBe(
      "Project with code 'X9' not found. Use the matching search tool to find valid codes or IDs.",
    );
  });

  it("should keep a plain 404 generic", () => {
    expect(describeError(new NotFoundError("Not Found"))).toBe(
      "Resource not found. The record may not exist, or you may not have access.",
    );
  });

  it("should describe rate limits by where they came from", () => {
    expect(describeError(new RateLimitExceededError("local", 2500))).toBe(
      "Request quota for this server is used up. Try again in 3 seconds.",
    );
    expect(describeError(new RateLimitExceededError("upstream"))).toBe(
      "Rate limited by iplicit. Please wait a moment and try again.",
    );
  });

  it("should map the remaining API errors", () => {
    expect(describeError(new PermissionDeniedError("Forbidden"))).toBe(
      "Access denied. Your iplicit user may not have permission for this action.",
    );
    expect(describeError(new TransientUpstreamError("503", 3))).toBe(
      "Could not reach iplicit after 3 attempts. Check your connection or try again later.",
    );
    expect(describeError(new ValidationError("docDate: The docDate field is required."))).toBe(
      "iplicit rejected the request: docDate: The docDate field is required.",
    );
    expect(describeError(new UnexpectedResponseShapeError("no id"))).toBe(
      "iplicit returned a response this server does not understand. The API may have changed.",
    );
  });

  it("should not leak details of auth or unknown failures", () => {
    expect(describeError(new AuthenticationError("bad key", 401))).toBe(
      "Authentication with iplicit failed. Check IPLICIT_USERNAME, IPLICIT_API_KEY and IPLICIT_DOMAIN.",
    );
    expect(describeError(new Error("token=test-secret"))).toBe("An unexpected error occurred. Please try again.");
  });
});
