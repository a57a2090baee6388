import { Binder } from "./binder";
import type { Constructor } from "./decorator";
import { BeanTypeError, DuplicateBeanError, FrozenContainerError, MissingDependencyError } from "./errors";
import type { Logger } from "./logger";
import { defaultSettings, validateBeanName, type ContainerOption, type RegisterOption, type RegisterOptions } from "./options";
import { typeName } from "./type-check";

export interface Keeper {
  /** Bean registered under `name`, or undefined. */
  find(name: string): unknown;
  has(name: string): boolean;
  /** Copy of every registered bean. */
  all(): Map<string, unknown>;
  /** Injects the bean's dependencies without registering it. */
  provide<T>(bean: T): T;
  /** Injects the bean's dependencies and registers it. */
  register<T>(bean: T, ...opts: RegisterOption[]): T;
}

/**
 * Name → bean registry. Not safe for concurrent registration: wire
 * everything during startup, then `freeze()` and only read.
 */
export class Container implements Keeper {
  private readonly beans = new Map<string, unknown>();
  private readonly binder: Binder;
  private readonly logger: Logger;
  private frozen = false;

  constructor(...opts: ContainerOption[]) {
    const settings = defaultSettings();
    for (const opt of opts) opt(settings);
    this.logger = settings.logger;
    this.binder = new Binder(this, this.logger);
  }

  // ---------------- Lookup ----------------
  find(name: string): unknown { return this.beans.get(name); }

  has(name: string): boolean { return this.beans.has(name); }

  get(name: string): unknown;
  get<T>(name: string, type: Constructor<T>): T;
  get<T>(name: string, type?: Constructor<T>): unknown {
    if (!this.beans.has(name)) throw new MissingDependencyError(name);
    const bean = this.beans.get(name);
    if (type && !(bean instanceof type)) {
      throw new BeanTypeError(`bean "${name}" is ${typeName(bean)}, not ${type.name}`, { name, actual: typeName(bean), expected: type.name });
    }
    return bean;
  }

  all(): Map<string, unknown> { return new Map(this.beans); }

  // ---------------- Wiring ----------------
  provide<T>(bean: T): T { return this.binder.bind(bean); }

  register<T>(bean: T, ...opts: RegisterOption[]): T {
    const options: RegisterOptions = { name: "" };
    for (const o of opts) o(options);
    if (this.frozen) throw new FrozenContainerError(options.name);
    const name = validateBeanName(options.name);
    if (this.beans.has(name)) throw new DuplicateBeanError(name, typeName(bean));
    if (bean === null || bean === undefined) throw new BeanTypeError(`cannot register an untyped nil as "${name}"`, { name });

    // only objects carry injection points; primitives and functions are stored as-is
    if (typeof bean === "object") this.binder.bind(bean);
    // binding runs the bean's hook, which may have registered the name itself
    if (this.beans.has(name)) throw new DuplicateBeanError(name, typeName(bean));
    this.beans.set(name, bean);
    this.logger.debug("bean registered", { name, type: typeName(bean) });
    return bean;
  }

  // ---------------- Lifecycle ----------------
  freeze(): this { this.frozen = true; return this; }

  isFrozen(): boolean { return this.frozen; }
}

export const createContainer = (...opts: ContainerOption[]) => new Container(...opts);

/** Process-wide container. */
export const globalContainer = new Container();
