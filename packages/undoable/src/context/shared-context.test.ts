import { describe, it, expect, vi } from "vitest";
import { z } from "zod";
import { contextKey, SharedContext } from "./shared-context";

describe("SharedContext", () => {
  describe("set / get", () => {
    it("treats keys case-insensitively and keeps the first spelling", () => {
      const context = new SharedContext();
      context.set("OrderId", "A-1");
      context.set("ORDERID", "A-2");
      expect(context.get("orderid")).toEqual({ ok: true, value: "A-2" });
      expect(context.keys()).toEqual(["OrderId"]);
      expect(context.size).toBe(1);
    });

    it("ignores undefined values", () => {
      const context = new SharedContext();
      context.set("total", 10);
      context.set("Total", undefined);
      expect(context.get("total")).toEqual({ ok: true, value: 10 });
    });

    it("reports a missing key", () => {
      expect(new SharedContext().get("missing")).toEqual({
        ok: false,
        error: { type: "CONTEXT_KEY_NOT_FOUND", key: "missing" },
      });
    });

    it("reports a type mismatch instead of coercing", () => {
      const context = new SharedContext({ total: "12" });
      expect(context.get("total", z.number())).toEqual({
        ok: false,
        error: {
          type: "CONTEXT_TYPE_MISMATCH",
          key: "total",
          issues: ["Expected number, received string"],
        },
      });
    });

    it("prefixes nested issues with their path", () => {
      const context = new SharedContext({ customer: { id: 5 } });
      const result = context.get("customer", z.object({ id: z.string() }));
      expect(result.ok).toBe(false);
      if (!result.ok && result.error.type === "CONTEXT_TYPE_MISMATCH") {
        expect(result.error.issues).toEqual(["id: Expected string, received number"]);
      }
    });

    it("returns the parsed value for a matching schema", () => {
      const context = new SharedContext({ amount: 42 });
      expect(context.get("AMOUNT", z.number().int())).toEqual({ ok: true, value: 42 });
    });
  });

  describe("typed keys", () => {
    const invoiceId = contextKey("invoiceId", z.string());

    it("validates through the key's schema", () => {
      const context = new SharedContext();
      context.set(invoiceId, "INV-7");
      expect(context.get(invoiceId)).toEqual({ ok: true, value: "INV-7" });
      expect(context.has("INVOICEID")).toBe(true);
    });

    it("are frozen", () => {
      expect(Object.isFrozen(invoiceId)).toBe(true);
    });
  });

  describe("tryGet", () => {
    it("distinguishes found from not found", () => {
      const context = new SharedContext({ region: "eu", retries: "three" });
      expect(context.tryGet("region")).toEqual({ found: true, value: "eu" });
      expect(context.tryGet("zone")).toEqual({ found: false });
      expect(context.tryGet("retries", z.number())).toEqual({ found: false });
    });
  });

  describe("has / delete", () => {
    it("removes entries regardless of casing", () => {
      const context = new SharedContext({ Token: "test-secret" });
      expect(context.has("token")).toBe(true);
      expect(context.delete("TOKEN")).toBe(true);
      expect(context.has("token")).toBe(false);
      expect(context.delete("token")).toBe(false);
    });
  });

  describe("update", () => {
    const counter = contextKey("count", z.number());

    it("serialises concurrent read-modify-write cycles", async () => {
      const context = new SharedContext();
      await Promise.all(
        Array.from({ length: 10 }, () =>
          context.update(counter, async (current) => {
            await new Promise((resolve) => setTimeout(resolve, 1));
            return (current ?? 0) + 1;
          })
        )
      );
      expect(context.get(counter)).toEqual({ ok: true, value: 10 });
    });

    it("returns the stored value", async () => {
      const context = new SharedContext({ count: 4 });
      expect(await context.update(counter, (current) => (current ?? 0) * 2)).toEqual({
        ok: true,
        value: 8,
      });
    });

    it("refuses to update a value of the wrong type", async () => {
      const context = new SharedContext({ count: "x" });
      const updater = vi.fn(() => 1);
      expect(await context.update(counter, updater)).toEqual({
        ok: false,
        error: { type: "CONTEXT_TYPE_MISMATCH", key: "count", issues: ["Expected number, received string"] },
      });
      expect(updater).not.toHaveBeenCalled();
    });
  });
});
