import { injectionPoints, type InjectionPoint } from "./decorator";
import { BeanTypeError, MissingDependencyError } from "./errors";
import type { Logger } from "./logger";
import { expectedName, isAssignable, typeName } from "./type-check";

/** Called once after all of a bean's dependencies have been assigned. */
export interface Initializer {
  afterPropertySet(): void;
}

export function isInitializer(bean: object): bean is Initializer {
  return "afterPropertySet" in bean && typeof bean.afterPropertySet === "function";
}

export interface BeanLookup {
  has(name: string): boolean;
  find(name: string): unknown;
}

type Assignment = { point: InjectionPoint; value: unknown };

const fieldName = (owner: string, point: InjectionPoint) => `${owner}.${String(point.property)}`;

/**
 * Wires a bean's declared injection points from a lookup. Every point is
 * resolved before any field is written: a missing or mismatched dependency
 * leaves all of the bean's fields as they were.
 */
export class Binder {
  constructor(private readonly lookup: BeanLookup, private readonly logger: Logger) {}

  bind<T>(bean: T): T {
    if (bean === null || bean === undefined) throw new BeanTypeError("cannot provide an untyped nil");
    if (typeof bean !== "object") {
      const shown = typeof bean === "function" ? typeName(bean) : String(bean);
      throw new BeanTypeError(`must provide a bean object, got ${shown} (type ${typeof bean})`, { type: typeName(bean) });
    }
    const owner = typeName(bean);

    const assignments: Assignment[] = [];
    for (const point of injectionPoints(bean)) {
      if (!this.lookup.has(point.dependency)) {
        if (point.optional) {
          this.logger.debug("optional dependency skipped", { bean: owner, dependency: point.dependency });
          continue;
        }
        throw new MissingDependencyError(point.dependency, fieldName(owner, point));
      }
      const value = this.lookup.find(point.dependency);
      const fits = point.guard ? point.guard(value) : isAssignable(value, point.type);
      if (!fits) {
        throw new BeanTypeError(
          `dependency "${point.dependency}" (${typeName(value)}) is not assignable to ${fieldName(owner, point)} (${expectedName(point.type)})`,
          { dependency: point.dependency, actual: typeName(value), owner, property: String(point.property), expected: expectedName(point.type) }
        );
      }
      assignments.push({ point, value });
    }

    for (const { point, value } of assignments) {
      if (!Reflect.set(bean, point.property, value)) {
        throw new BeanTypeError(`${fieldName(owner, point)} is not writable`, { owner, property: String(point.property) });
      }
      this.logger.debug("dependency injected", { bean: owner, property: String(point.property), dependency: point.dependency });
    }

    if (isInitializer(bean)) bean.afterPropertySet();
    return bean;
  }
}
