export type SpringErrorCode = "INVALID_PARAMETER" | "UNSUPPORTED_TYPE" | "TYPE_MISMATCH";

/**
 * Base class for caller errors raised by `target`/`stop`. None of these are
 * retried or recovered internally.
 */
export class SpringError extends Error {
  readonly code: SpringErrorCode;

  constructor(code: SpringErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidParameterError extends SpringError {
  readonly parameter: string;

  constructor(parameter: string, value: unknown) {
    super("INVALID_PARAMETER", `Invalid ${parameter}: ${String(value)}`);
    this.parameter = parameter;
  }
}

export class UnsupportedTypeError extends SpringError {
  constructor(typeName: string) {
    super("UNSUPPORTED_TYPE", `Unsupported type: ${typeName}`);
  }
}

export class TypeMismatchError extends SpringError {
  readonly property: string;

  constructor(property: string, currentKind: string, goalKind: string) {
    super("TYPE_MISMATCH", `Type mismatch: ${currentKind} ${property} = ${goalKind}`);
    this.property = property;
  }
}

/** Readable type name for error messages. */
export function describeType(value: unknown): string {
  if (value === null) return "null";
  if (typeof value !== "object") return typeof value;
  const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
  return typeof ctor === "function" && ctor.name ? ctor.name : "object";
}
