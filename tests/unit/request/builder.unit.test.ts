import { resetFs, loadFs } from "../../helpers/memfs";
import { describe, it, expect, beforeEach } from "vitest";
import { buildRequest, buildUrl, encodeForm, setHeaderValue } from "../../../src/request/builder";
import { ParseError, ResourceError } from "../../../src/errors/step-errors";
import { createTestContext } from "../../helpers/context";

const decode = (body: string | Uint8Array | undefined): string => {
  if (body === undefined) return "";
  return typeof body === "string" ? body : new TextDecoder().decode(body);
};

describe("request", () => {
  describe("builder", () => {
    beforeEach(() => {
      resetFs();
    });

    it("should join the base URL and the scope-resolved path", () => {
      const context = createTestContext();
      context.scope.store("id", "42");

      expect(buildUrl(context, "/users/`##id`")).toBe("https://api.test/users/42");
    });

    it("should encode query params in key order", () => {
      const context = createTestContext();
      context.setQueryParam("b", "2");
      context.setQueryParam("a", "1 2");

      expect(buildUrl(context, "/users")).toBe("https://api.test/users?a=1+2&b=2");
    });

    it("should merge query params with a query already in the path", () => {
      const context = createTestContext();
      context.setQueryParam("page", "1");

      expect(buildUrl(context, "/search?q=x")).toBe("https://api.test/search?page=1&q=x");
    });

    it("should reject a URL that cannot be parsed", () => {
      const context = createTestContext();

      expect(() => buildUrl(context, "::bad")).toThrow(ParseError);
    });

    it("should replace headers whose names differ only by case", () => {
      const headers: Record<string, string> = { "content-type": "text/plain", Accept: "*/*" };

      setHeaderValue(headers, "Content-Type", "application/json");

      expect(headers).toEqual({ Accept: "*/*", "Content-Type": "application/json" });
    });

    it("should build a request without a body", async () => {
      const context = createTestContext();
      context.setHeader("Accept", "application/json");

      const request = await buildRequest(context, { method: "get", path: "/users" });

      expect(request).toEqual({
        method: "GET",
        url: "https://api.test/users",
        headers: { Accept: "application/json" },
        bodyKind: "none",
      });
    });

    it("should resolve the scope in a raw body and keep the user's content type", async () => {
      const context = createTestContext();
      context.scope.store("name", "Alice");
      context.setHeader("Content-Type", "application/json");
      context.setQueryParam("dryRun", "true");

      const request = await buildRequest(context, {
        method: "POST",
        path: "/users",
        body: { kind: "raw", content: '{"name": "`##name`"}' },
      });

      expect(request.url).toBe("https://api.test/users?dryRun=true");
      expect(request.headers).toEqual({ "Content-Type": "application/json" });
      expect(request.bodyKind).toBe("raw");
      expect(request.body).toBe('{"name": "Alice"}');
    });

    it("should encode form rows as multipart and override the content type", async () => {
      loadFs({ "/uploads/avatar.png": "PNGDATA" });
      const context = createTestContext();
      context.scope.store("dir", "/uploads");
      context.setHeader("content-type", "application/json");

      const request = await buildRequest(context, {
        method: "POST",
        path: "/profile",
        body: {
          kind: "form",
          fields: [
            { key: "name", value: "Alice", kind: "text" },
            { key: "avatar", value: "`##dir`/avatar.png", kind: "file" },
          ],
        },
      });

      const contentType = request.headers["Content-Type"];
      expect(Object.keys(request.headers)).toEqual(["Content-Type"]);
      expect(contentType).toMatch(/^multipart\/form-data; boundary=/);
      expect(request.formSummary).toEqual({
        fields: 1,
        files: 1,
        parts: ["name=Alice", "avatar=@avatar.png (7 bytes)"],
      });

      const body = decode(request.body);
      expect(body).toContain('name="name"\r\n\r\nAlice\r\n');
      expect(body).toContain('name="avatar"; filename="avatar.png"');
      expect(body).toContain("PNGDATA");
      expect(body.indexOf('name="name"')).toBeLessThan(body.indexOf('name="avatar"'));
    });

    it("should fail when an upload file cannot be read", async () => {
      const context = createTestContext();

      const pending = encodeForm(context, [{ key: "file", value: "/missing.txt", kind: "file" }]);

      await expect(pending).rejects.toBeInstanceOf(ResourceError);
      await expect(pending).rejects.toThrow(/^cannot open file \/missing\.txt: /);
    });
  });
});
