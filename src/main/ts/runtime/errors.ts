/**
 * Error catalog for the object runtime.
 * Every message the core raises is formatted here so codes and wording stay in one place.
 */

export enum ErrorCode {
  ATTRIBUTE_NOT_FOUND = "ATTRIBUTE_NOT_FOUND",
  NOT_CALLABLE = "NOT_CALLABLE",
  NOT_A_CLASS = "NOT_A_CLASS",
  SLOT_ALREADY_PRESENT = "SLOT_ALREADY_PRESENT",
  LAYOUT_MISMATCH = "LAYOUT_MISMATCH",
  SLOT_OUT_OF_RANGE = "SLOT_OUT_OF_RANGE",
  MISSING_WRITE_HOOK = "MISSING_WRITE_HOOK",
  METACLASS_UNBOUND = "METACLASS_UNBOUND",
  METACLASS_REBOUND = "METACLASS_REBOUND",
  INVALID_METACLASS = "INVALID_METACLASS",
  INVALID_HOOK_ARGUMENTS = "INVALID_HOOK_ARGUMENTS",
  INVALID_OPTION = "INVALID_OPTION",
}

export type ErrorParams = Record<string, string | number>;

export interface ErrorDefinition {
  code: ErrorCode;
  // Invariant violations signal a broken bootstrap or primitive misuse.
  fatal: boolean;
  format: (params?: ErrorParams) => string;
}

function makeErrorDef(
  code: ErrorCode,
  fatal: boolean,
  format: (params?: ErrorParams) => string
): ErrorDefinition {
  return { code, fatal, format };
}

export const ERROR_CATALOG: Record<ErrorCode, ErrorDefinition> = {
  [ErrorCode.ATTRIBUTE_NOT_FOUND]: makeErrorDef(
    ErrorCode.ATTRIBUTE_NOT_FOUND,
    false,
    ({ name } = {}) => `attribute not found: ${name}`
  ),
  [ErrorCode.NOT_CALLABLE]: makeErrorDef(
    ErrorCode.NOT_CALLABLE,
    false,
    ({ value } = {}) => `value is not callable: ${value}`
  ),
  [ErrorCode.NOT_A_CLASS]: makeErrorDef(
    ErrorCode.NOT_A_CLASS,
    true,
    ({ value, role } = {}) => `expected a class for ${role}, got ${value}`
  ),
  [ErrorCode.SLOT_ALREADY_PRESENT]: makeErrorDef(
    ErrorCode.SLOT_ALREADY_PRESENT,
    true,
    ({ name, slot } = {}) => `layout already holds '${name}' at slot ${slot}`
  ),
  [ErrorCode.LAYOUT_MISMATCH]: makeErrorDef(
    ErrorCode.LAYOUT_MISMATCH,
    true,
    ({ layout, current } = {}) =>
      `layout ${layout} does not extend the current layout ${current}`
  ),
  [ErrorCode.SLOT_OUT_OF_RANGE]: makeErrorDef(
    ErrorCode.SLOT_OUT_OF_RANGE,
    true,
    ({ slot, layout } = {}) => `slot ${slot} is outside layout ${layout}`
  ),
  [ErrorCode.MISSING_WRITE_HOOK]: makeErrorDef(
    ErrorCode.MISSING_WRITE_HOOK,
    true,
    ({ hook, className } = {}) =>
      `no write hook '${hook}' resolvable from class ${className}`
  ),
  [ErrorCode.METACLASS_UNBOUND]: makeErrorDef(
    ErrorCode.METACLASS_UNBOUND,
    true,
    ({ className } = {}) => `class ${className} has no metaclass yet`
  ),
  [ErrorCode.METACLASS_REBOUND]: makeErrorDef(
    ErrorCode.METACLASS_REBOUND,
    true,
    ({ className } = {}) => `metaclass of ${className} is already bound`
  ),
  [ErrorCode.INVALID_METACLASS]: makeErrorDef(
    ErrorCode.INVALID_METACLASS,
    true,
    ({ className, metaclass } = {}) =>
      `metaclass ${metaclass} of ${className} does not derive from the default metaclass`
  ),
  [ErrorCode.INVALID_HOOK_ARGUMENTS]: makeErrorDef(
    ErrorCode.INVALID_HOOK_ARGUMENTS,
    true,
    ({ hook } = {}) => `invalid arguments to hook '${hook}'`
  ),
  [ErrorCode.INVALID_OPTION]: makeErrorDef(
    ErrorCode.INVALID_OPTION,
    true,
    ({ option, reason } = {}) => `invalid runtime option '${option}': ${reason}`
  ),
};

export class ObjectModelError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = "ObjectModelError";
    this.code = code;
  }
}

export class AttributeNotFoundError extends ObjectModelError {
  readonly attribute: string;

  constructor(attribute: string) {
    super(
      ErrorCode.ATTRIBUTE_NOT_FOUND,
      ERROR_CATALOG[ErrorCode.ATTRIBUTE_NOT_FOUND].format({ name: attribute })
    );
    this.name = "AttributeNotFoundError";
    this.attribute = attribute;
  }
}

export class NotCallableError extends ObjectModelError {
  constructor(message: string) {
    super(ErrorCode.NOT_CALLABLE, message);
    this.name = "NotCallableError";
  }
}

export class InvariantViolation extends ObjectModelError {
  constructor(code: ErrorCode, message: string) {
    super(code, message);
    this.name = "InvariantViolation";
  }
}

export function throwError(code: ErrorCode, params: ErrorParams = {}): never {
  const def = ERROR_CATALOG[code];
  if (code === ErrorCode.ATTRIBUTE_NOT_FOUND) {
    throw new AttributeNotFoundError(String(params.name));
  }
  if (code === ErrorCode.NOT_CALLABLE) {
    throw new NotCallableError(def.format(params));
  }
  if (def.fatal) {
    throw new InvariantViolation(code, def.format(params));
  }
  throw new ObjectModelError(code, def.format(params));
}

export function isFatal(error: unknown): boolean {
  return error instanceof ObjectModelError && ERROR_CATALOG[error.code].fatal;
}
