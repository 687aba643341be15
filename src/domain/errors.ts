/**
 * Typed error model.
 *
 * Every failure the registry core produces carries a TypedError: a
 * namespaced code, a retryable flag and machine-actionable suggested fixes.
 * The error kind is preserved from the catalog or blob store all the way to
 * the HTTP response, so callers can tell "bump your version" (Conflict)
 * apart from "retry the upload" (IntegrityError, TransientStorageError).
 */

/** Registry error taxonomy. */
export type ErrorKind =
  | 'NotFound'
  | 'Conflict'
  | 'IntegrityError'
  | 'InvalidState'
  | 'TransientStorageError'
  | 'Validation'
  | 'Aborted';

/** Namespaced code emitted for each kind. */
export const ERROR_CODES: Record<ErrorKind, string> = {
  NotFound: 'REGISTRY.NOT_FOUND',
  Conflict: 'REGISTRY.CONFLICT',
  IntegrityError: 'REGISTRY.INTEGRITY',
  InvalidState: 'REGISTRY.INVALID_STATE',
  TransientStorageError: 'STORAGE.TRANSIENT',
  Validation: 'VALIDATION.SCHEMA',
  Aborted: 'REGISTRY.ABORTED',
};

/** Typed suggested fix that a client can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The typed error structure returned in API responses. */
export interface TypedError {
  /** Namespaced error code (e.g., "REGISTRY.CONFLICT"). */
  code: string;
  message: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  details?: Record<string, unknown>;
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** Error thrown by the registry core. */
export class RegistryError extends Error {
  public readonly kind: ErrorKind;
  public readonly typedError: TypedError;

  constructor(kind: ErrorKind, typedError: TypedError, options?: { cause?: unknown }) {
    super(typedError.message, options);
    this.name = 'RegistryError';
    this.kind = kind;
    this.typedError = typedError;
  }

  get retryable(): boolean {
    return this.typedError.retryable;
  }
}

/** Narrow an unknown thrown value to a RegistryError, optionally of one kind. */
export function isRegistryError(err: unknown, kind?: ErrorKind): err is RegistryError {
  return err instanceof RegistryError && (kind === undefined || err.kind === kind);
}

// --- Factory functions ---

export function validationError(message: string, details?: Record<string, unknown>): RegistryError {
  return new RegistryError(
    'Validation',
    createTypedError({ code: ERROR_CODES.Validation, message, retryable: false, details }),
  );
}

export function notFoundError(resourceType: string, resourceId: string): RegistryError {
  return new RegistryError(
    'NotFound',
    createTypedError({
      code: ERROR_CODES.NotFound,
      message: `${resourceType} not found: ${resourceId}`,
      retryable: false,
      details: { resourceType, resourceId },
    }),
  );
}

export function conflictError(
  name: string,
  version: string,
  existingHash: string,
  attemptedHash: string,
): RegistryError {
  return new RegistryError(
    'Conflict',
    createTypedError({
      code: ERROR_CODES.Conflict,
      message: `${name}@${version} already exists with different content`,
      retryable: false,
      details: { name, version, existingHash, attemptedHash },
      suggestedFixes: [
        {
          type: 'BUMP_VERSION',
          params: { name, version },
          description: 'Published versions are immutable. Publish under a new version.',
        },
      ],
    }),
  );
}

export function deletedVersionConflictError(name: string, version: string): RegistryError {
  return new RegistryError(
    'Conflict',
    createTypedError({
      code: ERROR_CODES.Conflict,
      message: `${name}@${version} was deleted and cannot be reused until it is purged`,
      retryable: false,
      details: { name, version, state: 'deleted' },
      suggestedFixes: [{ type: 'BUMP_VERSION', params: { name, version } }],
    }),
  );
}

export function integrityError(message: string, details: Record<string, unknown>): RegistryError {
  return new RegistryError(
    'IntegrityError',
    createTypedError({
      code: ERROR_CODES.IntegrityError,
      message,
      retryable: false,
      details,
      suggestedFixes: [
        {
          type: 'RETRY_UPLOAD',
          params: {},
          description: 'Recompute the checksum and size of the artifact and upload it again.',
        },
      ],
    }),
  );
}

export function invalidStateError(entryId: string, from: string, to: string): RegistryError {
  return new RegistryError(
    'InvalidState',
    createTypedError({
      code: ERROR_CODES.InvalidState,
      message: `Cannot transition catalog entry ${entryId} from "${from}" to "${to}"`,
      retryable: false,
      details: { entryId, from, to },
    }),
  );
}

export function transientStorageError(
  operation: string,
  cause: unknown,
  details?: Record<string, unknown>,
): RegistryError {
  const reason = errorMessage(cause);
  return new RegistryError(
    'TransientStorageError',
    createTypedError({
      code: ERROR_CODES.TransientStorageError,
      message: `Storage operation "${operation}" failed: ${reason}`,
      retryable: true,
      details: { operation, ...details },
      suggestedFixes: [{ type: 'WAIT_AND_RETRY', params: { delayMs: 1000 } }],
    }),
    { cause },
  );
}

export function abortedError(operation: string): RegistryError {
  return new RegistryError(
    'Aborted',
    createTypedError({
      code: ERROR_CODES.Aborted,
      message: `${operation} was aborted before completion`,
      retryable: true,
      details: { operation },
    }),
  );
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: TypedError;
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}

// Node errors can come from another realm (Jest's sandbox), where
// `instanceof Error` does not hold. Read their fields by shape.
function isObject(err: unknown): err is object {
  return typeof err === 'object' && err !== null;
}

/** The `code` of a Node system error or driver error, if present. */
export function errorCode(err: unknown): string | undefined {
  return isObject(err) && 'code' in err && typeof err.code === 'string' ? err.code : undefined;
}

export function errorName(err: unknown): string | undefined {
  return isObject(err) && 'name' in err && typeof err.name === 'string' ? err.name : undefined;
}

/** The failing syscall of a Node system error, if present. */
export function errorSyscall(err: unknown): string | undefined {
  return isObject(err) && 'syscall' in err && typeof err.syscall === 'string' ? err.syscall : undefined;
}

export function errorMessage(err: unknown): string {
  return isObject(err) && 'message' in err && typeof err.message === 'string' ? err.message : String(err);
}
