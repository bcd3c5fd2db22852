export type ErrorKind = "validation" | "data_processing" | "rendering" | "performance";

export class EyemapError extends Error {
  readonly kind: ErrorKind;
  readonly operation?: string;
  readonly context: Record<string, unknown>;

  constructor(kind: ErrorKind, message: string, operation?: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = "EyemapError";
    this.kind = kind;
    this.operation = operation;
    this.context = context;
  }
}

export class ValidationError extends EyemapError {
  readonly field: string;
  readonly value: unknown;

  constructor(message: string, field: string, value: unknown, operation?: string) {
    super("validation", message, operation, { field, value });
    this.name = "ValidationError";
    this.field = field;
    this.value = value;
  }
}

export class DataProcessingError extends EyemapError {
  constructor(message: string, operation?: string, context: Record<string, unknown> = {}) {
    super("data_processing", message, operation, context);
    this.name = "DataProcessingError";
  }
}

export class RenderingError extends EyemapError {
  constructor(message: string, operation?: string, context: Record<string, unknown> = {}) {
    super("rendering", message, operation, context);
    this.name = "RenderingError";
  }
}

export class PerformanceError extends EyemapError {
  constructor(message: string, operation?: string, context: Record<string, unknown> = {}) {
    super("performance", message, operation, context);
    this.name = "PerformanceError";
  }
}

export type Ok<T> = { ok: true; value: T };
export type Err<E> = { ok: false; error: E };
export type Result<T, E extends EyemapError = EyemapError> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E extends EyemapError>(error: E): Err<E> {
  return { ok: false, error };
}

export function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
