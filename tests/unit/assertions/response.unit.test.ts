import { describe, it, expect } from "vitest";
import {
  assertBodyContains,
  assertBodyMatches,
  assertBodyMatchesJson,
  assertHeader,
  assertStatus,
  assertValidJson,
  readHeader,
} from "../../../src/assertions/response";
import { NoResponseError, ParseError, StepAssertionError } from "../../../src/errors/step-errors";
import { createTestContext, withResponse } from "../../helpers/context";

describe("assertions", () => {
  describe("response", () => {
    it("should pass when the status matches", () => {
      const context = withResponse(createTestContext(), { status: 201 });

      expect(() => assertStatus(context, 201)).not.toThrow();
    });

    it("should include the body in a status mismatch", () => {
      const context = withResponse(createTestContext(), { status: 500, body: "boom" });

      expect(() => assertStatus(context, 200)).toThrow(StepAssertionError);
      expect(() => assertStatus(context, 200)).toThrow(
        "expected status code to be 200, but actual is 500.\n Response body: boom"
      );
    });

    it("should require a response before checking the status", () => {
      expect(() => assertStatus(createTestContext(), 200)).toThrow(NoResponseError);
    });

    it("should validate that the body is JSON", () => {
      expect(() => assertValidJson(withResponse(createTestContext(), { body: "[1,2]" }))).not.toThrow();
      expect(() => assertValidJson(withResponse(createTestContext(), { body: "{" }))).toThrow(ParseError);
    });

    it("should compare documents ignoring key order and whitespace", () => {
      const context = withResponse(createTestContext(), { body: '\n{"b":[1,2],"a":{"c":"x"}}\n' });

      expect(() => assertBodyMatchesJson(context, '{ "a": { "c": "x" }, "b": [1, 2] }')).not.toThrow();
    });

    it("should resolve the scope in the expected document", () => {
      const context = withResponse(createTestContext(), { body: '{"id":"42"}' });
      context.scope.store("id", "42");

      expect(() => assertBodyMatchesJson(context, '{"id":"`##id`"}')).not.toThrow();
    });

    it("should report a document mismatch", () => {
      const context = withResponse(createTestContext(), { body: '{"b":[2,1]}' });

      expect(() => assertBodyMatchesJson(context, '{"b":[1,2]}')).toThrow(
        'expected json {"b":[1,2]}, does not match actual: {"b":[2,1]}'
      );
    });

    it("should fail when the expected document is not JSON", () => {
      const context = withResponse(createTestContext(), { body: "{}" });

      expect(() => assertBodyMatchesJson(context, "{oops")).toThrow(/^expected document is not valid JSON: /);
    });

    it("should look for a substring in the body", () => {
      const context = withResponse(createTestContext(), { body: "hello world\n" });

      expect(() => assertBodyContains(context, "lo wo")).not.toThrow();
      expect(() => assertBodyContains(context, "bye")).toThrow("hello world does not contain bye");
    });

    it("should match the body against a pattern", () => {
      const context = withResponse(createTestContext(), { body: "order-123" });

      expect(() => assertBodyMatches(context, "^order-\\d+$")).not.toThrow();
      expect(() => assertBodyMatches(context, "^item")).toThrow("order-123 does not match pattern: ^item");
      expect(() => assertBodyMatches(context, "(")).toThrow(ParseError);
    });

    it("should read headers case-insensitively", () => {
      const context = withResponse(createTestContext(), { headers: { "X-Request-Id": "abc" } });

      expect(readHeader(context, "x-request-id", "read")).toBe("abc");
      expect(readHeader(context, "X-Missing", "read")).toBe("");
    });

    it("should compare a header with the scope-resolved value", () => {
      const context = withResponse(createTestContext(), { headers: { "X-Request-Id": "abc" } });
      context.scope.store("rid", "abc");

      expect(() => assertHeader(context, "X-Request-Id", "`##rid`")).not.toThrow();
      expect(() => assertHeader(context, "X-Request-Id", "xyz")).toThrow(
        "expected header X-Request-Id to have value xyz. actual : abc"
      );
    });
  });
});
