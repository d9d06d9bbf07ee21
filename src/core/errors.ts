/**
 * Failure kinds raised by the token and directory clients.
 *
 * - `ProviderRejected`: the token endpoint answered with a non-2xx status or an unreadable body
 * - `MalformedIdentityToken`: the identity token could not be decoded
 * - `MissingField`: a required response field or claim is absent
 * - `DirectoryUnavailable`: the directory answered with a non-2xx status or an unexpected body
 * - `ProviderUnavailable`: the request never got an answer (network failure or timeout)
 */
export type AuthErrorKind =
  | 'ProviderRejected'
  | 'MalformedIdentityToken'
  | 'MissingField'
  | 'DirectoryUnavailable'
  | 'ProviderUnavailable';

/**
 * Options for constructing an AuthError.
 */
export interface AuthErrorOptions {
  /** HTTP status returned by the remote service, when there was one */
  status?: number;
  /** Underlying error */
  cause?: unknown;
}

/**
 * Error raised when a session cannot be established or refreshed.
 */
export class AuthError extends Error {
  readonly kind: AuthErrorKind;
  readonly status?: number;

  constructor(kind: AuthErrorKind, message: string, options?: AuthErrorOptions) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'AuthError';
    this.kind = kind;
    this.status = options?.status;
  }
}

/**
 * Type guard for AuthError.
 */
export function isAuthError(error: unknown): error is AuthError {
  return error instanceof AuthError;
}

/**
 * HTTP status an application should answer with for a failed authentication.
 * Rejections by the provider mean the user must sign in again (401);
 * unreachable or misbehaving upstream services are a gateway failure (502).
 */
export function authErrorStatus(kind: AuthErrorKind): 401 | 502 {
  switch (kind) {
    case 'ProviderRejected':
    case 'MalformedIdentityToken':
    case 'MissingField':
      return 401;
    case 'DirectoryUnavailable':
    case 'ProviderUnavailable':
      return 502;
  }
}
