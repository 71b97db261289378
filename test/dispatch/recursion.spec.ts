// test/dispatch/recursion.spec.ts
// Tests for recursive fallback detection and the resolution depth bound

import { describe, it, expect } from "vitest";
import {
  DispatchDomain,
  RecursiveFallbackError,
  functionResolver,
  answer,
  generate,
  type CallContext,
} from "../../src/core/dispatch";
import { deferred, silentLogger, sleep } from "../helpers/dispatch";

describe("recursive fallback", () => {
  it("fails a resolver that calls its own name", async () => {
    const domain = new DispatchDomain({ logger: silentLogger() });
    domain.setFallback(
      functionResolver(async ctx => {
        const inner = await domain.call(ctx.name);
        return answer(inner);
      })
    );

    const error = await domain.call("loop").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RecursiveFallbackError);
    expect(error).toMatchObject({
      dispatchName: "loop",
      depth: 1,
      message: "RecursiveFallback: 'loop' re-entered its own fallback at depth 1",
    });
    expect(domain.countEvents("recursive")).toBe(1);
    expect(domain.inProgress("loop")).toBe(false);
  });

  it("detects indirect cycles through other names", async () => {
    const domain = new DispatchDomain({ id: "main", logger: silentLogger() });
    const seen: CallContext[] = [];
    domain.setFallback(
      functionResolver(async ctx => {
        seen.push(ctx);
        const next = ctx.name === "a" ? "b" : "a";
        return answer(await domain.call(next));
      })
    );

    await expect(domain.call("a")).rejects.toThrow("RecursiveFallback: 'a' re-entered its own fallback at depth 2");
    expect(seen.map(ctx => [ctx.name, ctx.depth])).toEqual([
      ["a", 0],
      ["b", 1],
    ]);
    expect(seen[1]?.lineage).toEqual([{ domainId: "main", name: "a" }]);
  });

  it("bounds the depth of nested resolutions", async () => {
    const domain = new DispatchDomain({ logger: silentLogger(), maxDepth: 5 });
    const depths: number[] = [];
    domain.setFallback(
      functionResolver(async ctx => {
        depths.push(ctx.depth);
        await sleep(1);
        const next = `n${Number(ctx.name.slice(1)) + 1}`;
        return answer(await domain.call(next));
      })
    );

    const error = await domain.call("n0").catch((e: unknown) => e);

    expect(depths).toEqual([0, 1, 2, 3, 4, 5]);
    expect(error).toBeInstanceOf(RecursiveFallbackError);
    expect(error).toMatchObject({
      dispatchName: "n6",
      depth: 6,
      maxDepth: 5,
      message: "RecursiveFallback: resolving 'n6' exceeded depth 5",
    });
    expect(domain.installed()).toEqual([]);
  });

  it("allows handlers to call their own name once installed", async () => {
    const domain = new DispatchDomain({ logger: silentLogger() });
    domain.setFallback(
      functionResolver(() =>
        generate(async args => {
          const n = Number(args[0]);
          return n <= 1 ? 1 : n * Number(await domain.call("fact", [n - 1]));
        })
      )
    );

    await expect(domain.call("fact", [5])).resolves.toBe(120);
    expect(domain.stats().resolverCalls).toBe(1);
    expect(domain.countEvents("recursive")).toBe(0);
  });

  it("lets one domain's resolver call the same name in another domain", async () => {
    const remote = new DispatchDomain({
      logger: silentLogger(),
      fallback: functionResolver(() => answer("from remote")),
    });
    const local = new DispatchDomain({
      logger: silentLogger(),
      fallback: functionResolver(async ctx => answer(`local(${String(await remote.call(ctx.name))})`)),
    });

    await expect(local.call("lookup")).resolves.toBe("local(from remote)");
  });
});

describe("generation wait cycles", () => {
  it("settles two concurrent resolutions that call each other", async () => {
    const domain = new DispatchDomain({ logger: silentLogger() });
    domain.setFallback(
      functionResolver(async ctx => {
        await sleep(5);
        return answer(await domain.call(ctx.name === "a" ? "b" : "a"));
      })
    );

    const [a, b] = await Promise.allSettled([domain.call("a"), domain.call("b")]);

    expect(a.status).toBe("rejected");
    expect(b.status).toBe("rejected");
    expect(a.status === "rejected" && a.reason).toBeInstanceOf(RecursiveFallbackError);
    expect(b.status === "rejected" && b.reason).toBeInstanceOf(RecursiveFallbackError);
    expect(domain.inProgress("a")).toBe(false);
    expect(domain.inProgress("b")).toBe(false);
  });

  it("refuses the wait that would close the cycle", async () => {
    const domain = new DispatchDomain({ logger: silentLogger() });
    const gates = { a: deferred(), b: deferred() };
    domain.setFallback(
      functionResolver(async ctx => {
        const first = ctx.name === "a";
        await (first ? gates.a : gates.b).promise;
        return answer(await domain.call(first ? "b" : "a"));
      })
    );

    const a = domain.call("a");
    const b = domain.call("b");
    gates.a.resolve();
    await sleep(5);
    expect(domain.waiters("b")).toBe(1);
    gates.b.resolve();

    const [fromA, fromB] = await Promise.all([a.catch((e: unknown) => e), b.catch((e: unknown) => e)]);
    expect(fromB).toBeInstanceOf(RecursiveFallbackError);
    expect(fromB).toMatchObject({
      dispatchName: "a",
      waitCycle: true,
      message: "RecursiveFallback: waiting for 'a' would wait on its own fallback",
    });
    expect(fromA).toMatchObject({ message: "RecursiveFallback: 'a' re-entered its own fallback at depth 2" });
    expect(domain.countEvents("recursive")).toBe(2);
  });

  it("still waits on unrelated generations from inside a resolver", async () => {
    const domain = new DispatchDomain({ logger: silentLogger() });
    const gate = deferred();
    domain.setFallback(
      functionResolver(async ctx => {
        if (ctx.name === "shared") {
          await gate.promise;
          return generate(() => "shared value");
        }
        return answer(`${ctx.name} uses ${String(await domain.call("shared"))}`);
      })
    );

    const shared = domain.call("shared");
    const outer = domain.call("outer");
    await sleep(1);
    expect(domain.waiters("shared")).toBe(1);

    gate.resolve();
    await expect(outer).resolves.toBe("outer uses shared value");
    await expect(shared).resolves.toBe("shared value");
  });
});
