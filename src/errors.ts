export const ErrorCode = {
  VALIDATION: "VALIDATION",
  CONFLICT: "CONFLICT",
  TYPE_MISMATCH: "TYPE_MISMATCH",
  UNRESOLVED: "UNRESOLVED",
  FROZEN: "FROZEN",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/** Base class of everything the container throws. */
export class KeeperError extends Error {
  readonly code: ErrorCode;
  readonly details: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

/** Empty or malformed bean name / dependency tag. */
export class InvalidNameError extends KeeperError {
  constructor(message: string, readonly value: string) {
    super(ErrorCode.VALIDATION, message, { value });
  }
}

export class DuplicateBeanError extends KeeperError {
  constructor(readonly beanName: string, readonly rejectedType: string) {
    super(ErrorCode.CONFLICT, `bean "${beanName}" is already registered, rejected ${rejectedType}`, { beanName, rejectedType });
  }
}

/** Wrong kind of argument, or a dependency that does not fit its field. */
export class BeanTypeError extends KeeperError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(ErrorCode.TYPE_MISMATCH, message, details);
  }
}

export class MissingDependencyError extends KeeperError {
  constructor(readonly dependency: string, owner?: string) {
    super(
      ErrorCode.UNRESOLVED,
      owner ? `failed to resolve "${dependency}" for ${owner}` : `failed to resolve "${dependency}"`,
      { dependency, owner }
    );
  }
}

export class FrozenContainerError extends KeeperError {
  constructor(readonly beanName: string) {
    super(ErrorCode.FROZEN, `container is frozen, cannot register "${beanName}"`, { beanName });
  }
}
