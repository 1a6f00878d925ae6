import { describe, it, expect } from "vitest";
import { textResponse, errorResponse, resultToStructuredResponse } from "../src/mcp.js";
import { Ok, Err, type Result } from "../src/result.js";

describe("MCP utilities", () => {
  describe("textResponse", () => {
    it("creates a text-only response", () => {
      expect(textResponse("Hello")).toEqual({
        content: [{ type: "text", text: "Hello" }],
      });
    });
  });

  describe("errorResponse", () => {
    it("marks the response as an error and mirrors the message", () => {
      expect(errorResponse("Symbol not found: loader")).toEqual({
        content: [{ type: "text", text: "Error: Symbol not found: loader" }],
        structuredContent: { success: false, error: "Symbol not found: loader" },
        isError: true,
      });
    });
  });

  describe("resultToStructuredResponse", () => {
    it("formats Ok results with success flag merged into data", () => {
      const result: Result<number, string> = Ok(3);
      const response = resultToStructuredResponse(result, (count) => ({
        text: `Found ${count} cycle(s)`,
        data: { count },
      }));
      expect(response).toEqual({
        content: [{ type: "text", text: "Found 3 cycle(s)" }],
        structuredContent: { success: true, count: 3 },
      });
    });

    it("keeps the fields of tagged errors beside the message", () => {
      const result: Result<number, { kind: string; candidates: number[]; message: string }> = Err({
        kind: "ambiguous",
        candidates: [4, 9],
        message: "Ambiguous symbol: run",
      });
      const response = resultToStructuredResponse(result, () => ({ text: "", data: {} }));
      expect(response.content[0].text).toBe("Error: Ambiguous symbol: run");
      expect(response.structuredContent).toEqual({
        success: false,
        error: "Ambiguous symbol: run",
        kind: "ambiguous",
        candidates: [4, 9],
      });
    });

    it("accepts Error instances", () => {
      const result: Result<number, Error> = Err(new Error("boom"));
      const response = resultToStructuredResponse(result, () => ({ text: "", data: {} }));
      expect(response.content[0].text).toBe("Error: boom");
      expect(response.structuredContent).toEqual({ success: false, error: "boom" });
    });
  });
});
