import { BaseError, type ErrorContext } from "@keel/errors"

export class ValidationError extends BaseError<"validation_failed"> {
  constructor(message: string, context: ErrorContext = {}, cause?: unknown) {
    super(message, { code: "validation_failed", context, cause })
  }
}

/** `key` is undefined when the dict itself was empty. */
export class NotFoundError extends BaseError<"not_found"> {
  constructor(
    readonly key: string | undefined,
    message = key === undefined ? "Dictionary is empty" : `Key not found: ${key}`,
  ) {
    super(message, { code: "not_found", context: key === undefined ? {} : { key } })
  }
}

export class MissingCapabilityError extends BaseError<"missing_capability"> {
  constructor(
    readonly typeName: string,
    readonly member: string,
    kind: "instance" | "static",
  ) {
    super(`Class ${typeName} does not implement the required ${kind} method "${member}"`, {
      code: "missing_capability",
      context: { typeName, member, kind },
      isOperational: false,
    })
  }
}

export class TypeMismatchError extends BaseError<"type_mismatch"> {
  constructor(message: string, context: ErrorContext = {}, cause?: unknown) {
    super(message, { code: "type_mismatch", context, cause, isOperational: false })
  }
}

export class UnsupportedError extends BaseError<"unsupported"> {
  constructor(readonly operation: string) {
    super(`${operation} requires a store client that supports SCAN`, {
      code: "unsupported",
      context: { operation },
      isOperational: false,
    })
  }
}

export class PipelineFlushError extends BaseError<"pipeline_flush_failed"> {
  constructor(context: ErrorContext, cause: unknown) {
    super("Pipeline flush failed after the batch was sent", {
      code: "pipeline_flush_failed",
      context,
      cause,
      isRetryable: true,
    })
  }
}
