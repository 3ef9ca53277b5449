import type { ResourceKind } from '../types/resources';

/**
 * Error hierarchy for the inventory connector.
 *
 * Every error carries a machine-readable `code` and a `context` bag for
 * structured logging. Collaborator failures are `ServiceError`s tagged with
 * the resource kind they were fetching; caller mistakes are `ValidationError`s.
 */
export class InventoryError extends Error {
  readonly code: string;
  readonly context: Record<string, unknown>;
  readonly cause?: unknown;

  constructor(code: string, message: string, context: Record<string, unknown> = {}, cause?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.context = context;
    this.cause = cause;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      stack: this.stack,
      ...(this.cause instanceof Error ? { cause: this.cause.message } : {}),
    };
  }

  /** Body safe to hand back to a remote caller: no stack, no context. */
  toResponseBody(): { error: string; code: string } {
    return { error: this.message, code: this.code };
  }
}

/** A call to the platform failed while working on one resource kind. */
export class ServiceError extends InventoryError {
  readonly kind: ResourceKind;

  constructor(
    kind: ResourceKind,
    message: string,
    context: Record<string, unknown> = {},
    cause?: unknown,
    code = 'SERVICE_ERROR'
  ) {
    super(code, message, { kind, ...context }, cause);
    this.kind = kind;
  }
}

/** Network failure, timeout or aborted request. */
export class TransportError extends ServiceError {
  constructor(kind: ResourceKind, message: string, context: Record<string, unknown> = {}, cause?: unknown) {
    super(kind, message, context, cause, 'TRANSPORT_ERROR');
  }
}

/** Credentials rejected or token no longer accepted. */
export class AuthenticationError extends ServiceError {
  constructor(kind: ResourceKind, message: string, context: Record<string, unknown> = {}, cause?: unknown) {
    super(kind, message, context, cause, 'AUTHENTICATION_ERROR');
  }
}

export class NotFoundError extends ServiceError {
  readonly id: string;

  constructor(kind: ResourceKind, id: string, cause?: unknown) {
    super(kind, `${kind} '${id}' not found`, { id }, cause, 'NOT_FOUND');
    this.id = id;
  }
}

/** The platform answered, but not with the envelope we expected. */
export class MalformedResponseError extends ServiceError {
  constructor(kind: ResourceKind, message: string, context: Record<string, unknown> = {}) {
    super(kind, message, context, undefined, 'MALFORMED_RESPONSE');
  }
}

/** Missing or invalid caller argument; raised before any I/O. */
export class ValidationError extends InventoryError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super('VALIDATION_ERROR', message, context);
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return typeof err === 'string' ? err : JSON.stringify(err) ?? String(err);
}
