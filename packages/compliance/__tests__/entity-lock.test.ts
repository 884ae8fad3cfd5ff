// packages/compliance/__tests__/entity-lock.test.ts
import { describe, expect, test } from "vitest";

import { withEntityLock } from "../src/entity-lock.js";
import { memoryLedger } from "./_helpers/ledger.js";

const tick = () => new Promise((resolve) => setTimeout(resolve, 1));

describe("withEntityLock", () => {
  test("steps for one entity run one at a time, other entities are not blocked", async () => {
    const ledger = memoryLedger();
    const order: string[] = [];

    const step = (entity: string, name: string) =>
      withEntityLock(ledger, entity, async () => {
        order.push(`${name}:start`);
        await tick();
        order.push(`${name}:end`);
        return name;
      });

    const results = await Promise.all([step("hold:1", "a"), step("hold:1", "b"), step("hold:2", "c")]);

    expect(results).toEqual(["a", "b", "c"]);
    expect(order.indexOf("a:end")).toBeLessThan(order.indexOf("b:start"));
    expect(order.indexOf("c:start")).toBeLessThan(order.indexOf("a:end"));
  });

  test("a failing step releases the entity", async () => {
    const ledger = memoryLedger();
    await expect(
      withEntityLock(ledger, "hold:1", async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    expect(await withEntityLock(ledger, "hold:1", async () => "next")).toBe("next");
  });
});
