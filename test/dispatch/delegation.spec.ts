// test/dispatch/delegation.spec.ts
// Tests for the delegation adapter

import { describe, it, expect, vi } from "vitest";
import {
  DispatchDomain,
  DelegationTargetMissingError,
  createDelegationResolver,
} from "../../src/core/dispatch";
import { silentLogger } from "../helpers/dispatch";

class Counter {
  count = 0;

  increment(by: number): number {
    this.count += by;
    return this.count;
  }

  async fetchCount(): Promise<number> {
    return this.count;
  }

  explode(): never {
    throw new RangeError("counter exploded");
  }
}

function delegatingDomain(target: object, onGenerate?: (name: string, args: readonly unknown[]) => void) {
  const logger = silentLogger();
  return new DispatchDomain({ logger, fallback: createDelegationResolver(target, { logger, onGenerate }) });
}

describe("delegation adapter", () => {
  it("forwards calls and instruments only the first one per name", async () => {
    const onGenerate = vi.fn();
    const domain = delegatingDomain({ greet: (who: string) => `hi ${who}` }, onGenerate);

    await expect(domain.call("greet", ["bob"])).resolves.toBe("hi bob");
    await expect(domain.call("greet", ["amy"])).resolves.toBe("hi amy");

    expect(onGenerate).toHaveBeenCalledTimes(1);
    expect(onGenerate).toHaveBeenCalledWith("greet", ["bob"]);
    expect(domain.stats()).toMatchObject({ resolverCalls: 1, hits: 1 });
  });

  it("binds the target as this", async () => {
    const counter = new Counter();
    const domain = delegatingDomain(counter);

    await domain.call("increment", [2]);
    await expect(domain.call("increment", [3])).resolves.toBe(5);
    expect(counter.count).toBe(5);
  });

  it("returns asynchronous results verbatim", async () => {
    const counter = new Counter();
    counter.count = 7;
    const domain = delegatingDomain(counter);

    await expect(domain.call("fetchCount")).resolves.toBe(7);
  });

  it("passes target errors through untouched", async () => {
    const domain = delegatingDomain(new Counter());
    const error = await domain.call("explode").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RangeError);
    expect(error).toMatchObject({ message: "counter exploded" });
  });

  it("fails names the target lacks without installing anything", async () => {
    const onGenerate = vi.fn();
    const domain = delegatingDomain(new Counter(), onGenerate);

    await expect(domain.call("reset")).rejects.toBeInstanceOf(DelegationTargetMissingError);
    await expect(domain.call("count")).rejects.toThrow(
      "DelegationTargetMissing: delegation target has no method 'count'"
    );
    expect(domain.isInstalled("reset")).toBe(false);
    expect(onGenerate).not.toHaveBeenCalled();
  });

  it("fails installed forwarders whose member was removed", async () => {
    const target: { greet?: () => string } = { greet: () => "hello" };
    const domain = delegatingDomain(target);

    await expect(domain.call("greet")).resolves.toBe("hello");
    delete target.greet;
    await expect(domain.call("greet")).rejects.toBeInstanceOf(DelegationTargetMissingError);
  });

  it("reports capability from the target's methods", () => {
    const domain = delegatingDomain(new Counter());

    expect(domain.can("increment")).toBe(true);
    expect(domain.can("count")).toBe(false);
    expect(domain.can("reset")).toBe(false);
    expect(domain.stats().resolverCalls).toBe(0);
  });
});
