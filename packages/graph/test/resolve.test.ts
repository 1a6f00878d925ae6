import { describe, it, expect } from "vitest";
import { InMemoryRelationshipStore } from "@codepulse/store";

import { resolveSymbol } from "../src/resolve.js";

const store = new InMemoryRelationshipStore({
  files: [
    { id: 1, path: "src/users.ts" },
    { id: 2, path: "src/orders.ts" },
    { id: 3, path: "src/legacy.ts" },
  ],
  symbols: [
    { id: 1, fileId: 1, name: "save", qualifiedName: "users.save", lineStart: 4 },
    { id: 2, fileId: 2, name: "save", qualifiedName: "orders.save", lineStart: 8 },
    { id: 3, fileId: 2, name: "checkout", qualifiedName: "orders.checkout" },
    { id: 4, fileId: 3, name: "render", lineStart: 2 },
    { id: 5, fileId: 1, name: "render", lineStart: 9 },
    { id: 6, fileId: 3, name: "formatPrice" },
  ],
  edges: [{ sourceId: 3, targetId: 2 }],
});

describe("resolveSymbol", () => {
  it("prefers an exact qualified name", () => {
    const result = resolveSymbol(store, "users.save");
    expect(result.ok && result.value.id).toBe(1);
  });

  it("picks the most referenced of several same-named symbols", () => {
    const result = resolveSymbol(store, "save");
    expect(result.ok && result.value.id).toBe(2);
  });

  it("reports ambiguity when no candidate is referenced", () => {
    const result = resolveSymbol(store, "render");

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("ambiguous");
    if (result.error.kind !== "ambiguous") return;
    expect(result.error.candidates.map((c) => c.filePath)).toEqual(["src/legacy.ts", "src/users.ts"]);
  });

  it("falls back to substring search", () => {
    const result = resolveSymbol(store, "price");
    expect(result.ok && result.value.name).toBe("formatPrice");
  });

  it("reports a missing symbol as not found", () => {
    const result = resolveSymbol(store, "nothing_here");
    expect(result).toEqual({
      ok: false,
      error: { kind: "not_found", query: "nothing_here", message: "Symbol not found: nothing_here" },
    });
  });
});
