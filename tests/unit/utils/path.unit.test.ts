import { describe, it, expect } from "vitest";
import { extractPath, normalizePath } from "../../../src/utils/path";

describe("utils", () => {
  describe("path", () => {
    it("should strip scheme, host, query and fragment", () => {
      expect(extractPath("https://api.example.test/v1/items?page=2")).toBe("/v1/items");
      expect(extractPath("http://localhost:4010")).toBe("/");
      expect(extractPath("/items#section")).toBe("/items");
    });

    it("should add a leading slash to relative paths", () => {
      expect(extractPath("accounts/42")).toBe("/accounts/42");
      expect(normalizePath("")).toBe("/");
    });
  });
});
