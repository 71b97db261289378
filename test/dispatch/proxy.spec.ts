// test/dispatch/proxy.spec.ts
// Tests for exposing a domain as a dynamic object

import { describe, it, expect, vi } from "vitest";
import {
  DispatchDomain,
  createDynamicObject,
  functionResolver,
  generate,
} from "../../src/core/dispatch";
import { silentLogger } from "../helpers/dispatch";

function echoDomain() {
  const resolve = vi.fn(() => generate((args, arity) => (arity === "multi" ? [...args] : args.join(" "))));
  const domain = new DispatchDomain({
    logger: silentLogger(),
    fallback: functionResolver(resolve, name => name.startsWith("say")),
  });
  return { domain, resolve };
}

describe("createDynamicObject", () => {
  it("turns property reads into dispatched calls", async () => {
    const { domain } = echoDomain();
    const obj = createDynamicObject(domain);

    await expect(obj.sayHello?.("to", "you")).resolves.toBe("to you");
    expect(domain.isInstalled("sayHello")).toBe(true);
  });

  it("reuses methods only for installed names", async () => {
    const { domain } = echoDomain();
    const obj = createDynamicObject(domain);

    expect(obj.sayHi).not.toBe(obj.sayHi);

    await obj.sayHi?.("there");
    expect(obj.sayHi).toBe(obj.sayHi);
  });

  it("passes the object's call options through", async () => {
    const obj = createDynamicObject(echoDomain().domain, { arity: "multi" });
    await expect(obj.sayAll?.("a", "b")).resolves.toEqual(["a", "b"]);
  });

  it("can be awaited and serialized without reaching the fallback", async () => {
    const { domain, resolve } = echoDomain();
    const obj = createDynamicObject(domain);

    expect(obj.then).toBeUndefined();
    expect(await Promise.resolve(obj)).toBe(obj);
    expect(JSON.stringify(obj)).toBe("{}");
    expect(resolve).not.toHaveBeenCalled();
  });

  it("exposes reserved names once a handler is installed", async () => {
    const { domain } = echoDomain();
    domain.define("dispose", () => "released");
    const obj = createDynamicObject(domain);

    await expect(obj.dispose?.()).resolves.toBe("released");
  });

  it("reads symbols as undefined", () => {
    const obj = createDynamicObject(echoDomain().domain);
    const iterator: unknown = Reflect.get(obj, Symbol.iterator);
    expect(iterator).toBeUndefined();
  });

  it("answers the in operator with capability", () => {
    const obj = createDynamicObject(echoDomain().domain);

    expect("sayHello" in obj).toBe(true);
    expect("shout" in obj).toBe(false);
    expect("then" in obj).toBe(false);
  });

  it("refuses writes", () => {
    const obj = createDynamicObject(echoDomain().domain);

    expect(Reflect.set(obj, "sayHello", () => "nope")).toBe(false);
    expect(Reflect.deleteProperty(obj, "sayHello")).toBe(false);
  });
});
