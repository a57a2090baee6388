import "reflect-metadata";
import { parseTag } from "./options";

const INJECTIONS = "keeper:injections";

/** One field of a bean that gets wired to another bean by name. */
export interface InjectionPoint {
  readonly property: string | symbol;
  readonly dependency: string;
  readonly optional: boolean;
  /** Expected runtime type, usually the compiler's `design:type`. */
  readonly type?: Function;
  /** Overrides the `type` check when present. */
  readonly guard?: (value: unknown) => boolean;
}

export type NamedOptions = { optional?: boolean };

export type FieldOptions = NamedOptions & {
  type?: Function;
  guard?: (value: unknown) => boolean;
};

export type Constructor<T> = new (...args: never[]) => T;

export type FieldDecorator = (target: object, propertyKey: string | symbol) => void;

function isInjectionPoint(v: unknown): v is InjectionPoint {
  if (typeof v !== "object" || v === null) return false;
  return "property" in v && "dependency" in v && typeof v.dependency === "string" && "optional" in v && typeof v.optional === "boolean";
}

function ownPoints(target: object): InjectionPoint[] {
  const list: unknown = Reflect.getOwnMetadata(INJECTIONS, target);
  return Array.isArray(list) ? list.filter(isInjectionPoint) : [];
}

/** Adds (or replaces, by property) a point on the class prototype `target`. */
export function addInjectionPoint(target: object, point: InjectionPoint): void {
  const points = ownPoints(target).filter(p => p.property !== point.property);
  points.push(point);
  Reflect.defineMetadata(INJECTIONS, points, target);
}

/** Points declared along the bean's prototype chain, base class first. */
export function injectionPoints(bean: object): InjectionPoint[] {
  const chain: object[] = [];
  let o: unknown = bean;
  while (typeof o === "object" && o !== null && o !== Object.prototype) {
    chain.unshift(o);
    o = Object.getPrototypeOf(o);
  }
  const merged = new Map<string | symbol, InjectionPoint>();
  for (const level of chain) for (const p of ownPoints(level)) merged.set(p.property, p);
  return [...merged.values()];
}

function designType(target: object, propertyKey: string | symbol): Function | undefined {
  const type: unknown = Reflect.getMetadata("design:type", target, propertyKey);
  return typeof type === "function" ? type : undefined;
}

/**
 * Marks a field as an injection point for the bean registered under `tag`
 * (`"name"` or `"name,optional"`). Works on private fields too.
 *
 * @example
 * class HelloCtl {
 *   @Named("helloService") private helloSrv!: HelloSrv;
 *   @Named("metrics", { optional: true }) metrics?: Metrics;
 * }
 */
export function Named(tag: string, opts: NamedOptions = {}): FieldDecorator {
  const { name, optional } = parseTag(tag);
  return (target: object, propertyKey: string | symbol) => {
    addInjectionPoint(target, {
      property: propertyKey,
      dependency: name,
      optional: optional || opts.optional === true,
      type: designType(target, propertyKey),
    });
  };
}

/** Decorator-free way of declaring injection points for a class. */
export class BeanDescriptor<T extends object> {
  constructor(private readonly ctor: Constructor<T>) {}

  field(property: string | symbol, tag: string, opts: FieldOptions = {}): this {
    const { name, optional } = parseTag(tag);
    const proto: object = this.ctor.prototype;
    addInjectionPoint(proto, {
      property,
      dependency: name,
      optional: optional || opts.optional === true,
      type: opts.type ?? designType(proto, property),
      guard: opts.guard,
    });
    return this;
  }
}

export const describeBean = <T extends object>(ctor: Constructor<T>) => new BeanDescriptor(ctor);
