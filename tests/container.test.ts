import { describe, it, expect } from "@jest/globals";
import "reflect-metadata";
import { Container, createContainer, globalContainer } from "../src/container";
import { Named } from "../src/decorator";
import { BeanTypeError, DuplicateBeanError, ErrorCode, FrozenContainerError, InvalidNameError, MissingDependencyError } from "../src/errors";
import { named, withLogger } from "../src/options";
import type { Logger } from "../src/logger";

class HelloSrv {
  constructor(private word = "") {}
  hello() { return "Hello World " + this.word; }
}

class HelloCtl {
  @Named("helloService") private helloSrv!: HelloSrv;
  hello() { return this.helloSrv.hello(); }
}

describe("Container - registration and lookup", () => {
  it("wires HelloCtl to the registered HelloSrv", () => {
    const c = new Container();
    const srv = new HelloSrv("keeper");
    c.register(srv, named("helloService"));
    c.register(new HelloCtl(), named("helloCtl"));

    const ctl = c.get("helloCtl", HelloCtl);
    expect(ctl.hello()).toBe(srv.hello());
    expect(ctl.hello()).toBe("Hello World keeper");
  });

  it("returns the same instance from find, get and all", () => {
    const c = createContainer();
    const srv = new HelloSrv();
    expect(c.register(srv, named("n"))).toBe(srv);
    expect(c.find("n")).toBe(srv);
    expect(c.get("n")).toBe(srv);
    expect(c.all().get("n")).toBe(srv);
  });

  it("returns undefined for unknown names", () => {
    const c = new Container();
    expect(c.find("nope")).toBeUndefined();
    expect(c.has("nope")).toBe(false);
    expect(() => c.get("nope")).toThrow(MissingDependencyError);
  });

  it("stores primitives and functions as-is", () => {
    const c = new Container();
    const factory = () => 1;
    c.register(0, named("zero"));
    c.register("", named("empty"));
    c.register(factory, named("factory"));
    expect(c.has("zero")).toBe(true);
    expect(c.find("zero")).toBe(0);
    expect(c.find("empty")).toBe("");
    expect(c.find("factory")).toBe(factory);
  });

  it("typed get rejects a bean of another class", () => {
    const c = new Container();
    c.register(new HelloSrv(), named("helloService"));
    expect(() => c.get("helloService", HelloCtl)).toThrow('bean "helloService" is HelloSrv, not HelloCtl');
  });
});

describe("Container - conflicts and validation", () => {
  it("keeps the first bean when a name is registered twice", () => {
    const c = new Container();
    const first = new HelloSrv("first");
    c.register(first, named("svc"));

    let error: unknown;
    try { c.register(new HelloSrv("second"), named("svc")); } catch (e) { error = e; }
    expect(error).toBeInstanceOf(DuplicateBeanError);
    expect(error).toMatchObject({ code: ErrorCode.CONFLICT, message: 'bean "svc" is already registered, rejected HelloSrv' });
    expect(c.find("svc")).toBe(first);
  });

  it("rejects a missing or empty name", () => {
    const c = new Container();
    expect(() => c.register(new HelloSrv())).toThrow(new InvalidNameError("cannot use empty name", ""));
    expect(() => c.register(new HelloSrv(), named(""))).toThrow("cannot use empty name");
  });

  it("rejects a name taken while the bean's own hook ran", () => {
    const c = new Container();
    const inner = new HelloSrv("inner");
    class Outer {
      afterPropertySet() { c.register(inner, named("svc")); }
    }

    expect(() => c.register(new Outer(), named("svc"))).toThrow('bean "svc" is already registered, rejected Outer');
    expect(c.find("svc")).toBe(inner);
  });

  it("rejects names containing a backquote", () => {
    const c = new Container();
    expect(() => c.register(new HelloSrv(), named("a`b"))).toThrow('invalid name "a`b": names cannot contain backquotes');
    expect(c.all().size).toBe(0);
  });

  it("rejects null and undefined beans", () => {
    const c = new Container();
    expect(() => c.register(null, named("nil"))).toThrow(BeanTypeError);
    expect(() => c.register(undefined, named("nil"))).toThrow('cannot register an untyped nil as "nil"');
    expect(c.has("nil")).toBe(false);
  });
});

describe("Container - failures leave the registry untouched", () => {
  it("does not register a bean whose required dependency is missing", () => {
    const c = new Container();
    expect(() => c.register(new HelloCtl(), named("helloCtl"))).toThrow('failed to resolve "helloService" for HelloCtl.helloSrv');
    expect(c.all().has("helloCtl")).toBe(false);
  });

  it("does not register a bean whose dependency has the wrong type", () => {
    const c = new Container();
    c.register("not a service", named("helloService"));
    expect(() => c.register(new HelloCtl(), named("helloCtl"))).toThrow(BeanTypeError);
    expect(c.has("helloCtl")).toBe(false);
  });
});

describe("Container - snapshots and phases", () => {
  it("all() returns a copy", () => {
    const c = new Container();
    const srv = new HelloSrv();
    c.register(srv, named("helloService"));

    const snapshot = c.all();
    snapshot.set("intruder", 1);
    snapshot.delete("helloService");

    expect(c.find("intruder")).toBeUndefined();
    expect(c.find("helloService")).toBe(srv);
    expect(c.all().size).toBe(1);
  });

  it("freeze() blocks registration but not reads or provide", () => {
    const c = new Container();
    const srv = new HelloSrv("frozen");
    c.register(srv, named("helloService"));
    expect(c.freeze()).toBe(c);
    expect(c.isFrozen()).toBe(true);

    expect(() => c.register(new HelloCtl(), named("helloCtl"))).toThrow(FrozenContainerError);
    expect(c.find("helloService")).toBe(srv);
    expect(c.provide(new HelloCtl()).hello()).toBe("Hello World frozen");
  });

  it("globalContainer is a shared Container", () => {
    expect(globalContainer).toBeInstanceOf(Container);
    const marker = { id: "global" };
    globalContainer.register(marker, named("container.test:marker"));
    expect(globalContainer.find("container.test:marker")).toBe(marker);
  });
});

describe("Container - logging", () => {
  it("reports registrations and skipped optionals through the given logger", () => {
    const entries: string[] = [];
    const record = (msg: string, meta?: Record<string, unknown>) => { entries.push(`${msg} ${JSON.stringify(meta)}`); };
    const logger: Logger = { debug: record, info: record, warn: record, error: record };

    class Reporter {
      @Named("sink,optional") sink?: HelloSrv;
    }
    const c = new Container(withLogger(logger));
    c.register(new Reporter(), named("reporter"));

    expect(entries).toEqual([
      'optional dependency skipped {"bean":"Reporter","dependency":"sink"}',
      'bean registered {"name":"reporter","type":"Reporter"}',
    ]);
  });
});
