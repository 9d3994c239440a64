/**
 * Portal error taxonomy.
 *
 * Every distinguishable failure in the gateway maps to exactly one code so that
 * monitoring can tell an unauthorized-access attempt apart from an ordinary typo.
 * `message` is for logs and audit entries; `userMessage` is what a browser sees.
 */

export type PortalErrorCode =
  | 'MISSING_FIELDS'
  | 'INVALID_CREDENTIALS'
  | 'INVALID_DEPARTMENT'
  | 'UNAUTHORIZED'
  | 'DIRECTORY_ERROR'
  | 'SESSION_EXPIRED'
  | 'INVALID_CODE_FORMAT'
  | 'NOT_ENROLLED'
  | 'CONFIGURATION_ERROR'
  | 'INVALID_CODE'
  | 'INVALID_AUTH_EVIDENCE'
  | 'NO_ROLES_ASSIGNED'
  | 'UNRECOGNIZED_ROLE'
  | 'ROUTING_MISCONFIGURATION'
  | 'BACKEND_UNAVAILABLE'
  | 'BACKEND_TIMEOUT'
  | 'PROXY_INTERNAL_ERROR';

export class PortalError extends Error {
  constructor(
    public readonly code: PortalErrorCode,
    message: string,
    public readonly statusCode: number = 500,
    public readonly userMessage: string = message,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PortalError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PortalError);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      details: this.details,
    };
  }
}

export function createPortalError(
  code: PortalErrorCode,
  message: string,
  statusCode: number = 500,
  userMessage?: string,
  details?: Record<string, unknown>
): PortalError {
  return new PortalError(code, message, statusCode, userMessage ?? message, details);
}

const GENERIC_CREDENTIALS_MESSAGE = 'Invalid username or password';

export const PortalErrors = {
  MISSING_FIELDS: (fields: string[]) =>
    createPortalError(
      'MISSING_FIELDS',
      `Missing required fields: ${fields.join(', ')}`,
      400,
      'Please fill in all required fields'
    ),

  INVALID_CREDENTIALS: (username: string, reason?: string) =>
    createPortalError(
      'INVALID_CREDENTIALS',
      `Directory bind failed for ${username}${reason ? `: ${reason}` : ''}`,
      401,
      GENERIC_CREDENTIALS_MESSAGE,
      { username }
    ),

  INVALID_DEPARTMENT: (department: string) =>
    createPortalError(
      'INVALID_DEPARTMENT',
      `Unknown department: ${department}`,
      400,
      'Invalid department selected',
      { department }
    ),

  UNAUTHORIZED: (username: string, department: string, groups: string[]) =>
    createPortalError(
      'UNAUTHORIZED',
      `${username} is not a member of the group required for ${department} (groups: ${groups.join(', ') || 'none'})`,
      403,
      `Access denied: You are not authorized for the ${department} department`,
      { username, department, groups }
    ),

  DIRECTORY_ERROR: (username: string, cause: string) =>
    createPortalError(
      'DIRECTORY_ERROR',
      `Directory error while authenticating ${username}: ${cause}`,
      503,
      'Authentication service unavailable. Please try again later.',
      { username }
    ),

  SESSION_EXPIRED: () =>
    createPortalError(
      'SESSION_EXPIRED',
      'No pending authentication for this session',
      401,
      'Session expired. Please log in again.'
    ),

  INVALID_CODE_FORMAT: (username: string) =>
    createPortalError(
      'INVALID_CODE_FORMAT',
      `Malformed authenticator code submitted by ${username}`,
      400,
      'Authenticator code must be 6 digits',
      { username }
    ),

  NOT_ENROLLED: (username: string) =>
    createPortalError(
      'NOT_ENROLLED',
      `No second-factor secret enrolled for ${username}`,
      403,
      'Two-factor authentication is not set up for this account. Please contact your administrator to enroll an authenticator app.',
      { username }
    ),

  CONFIGURATION_ERROR: (message: string) =>
    createPortalError(
      'CONFIGURATION_ERROR',
      `Configuration error: ${message}`,
      500,
      'Two-factor authentication is not configured. Please contact your administrator.'
    ),

  INVALID_CODE: (username: string) =>
    createPortalError(
      'INVALID_CODE',
      `Authenticator code rejected for ${username}`,
      401,
      'Invalid authenticator code. Please check your authenticator app and try again.',
      { username }
    ),

  INVALID_AUTH_EVIDENCE: (reason: string) =>
    createPortalError(
      'INVALID_AUTH_EVIDENCE',
      `Invalid authentication evidence: ${reason}`,
      401,
      'Invalid authentication headers. Please log in again.'
    ),

  NO_ROLES_ASSIGNED: (email: string) =>
    createPortalError(
      'NO_ROLES_ASSIGNED',
      `No roles assigned to ${email}`,
      403,
      'No roles assigned to your account. Please contact your administrator.',
      { email }
    ),

  UNRECOGNIZED_ROLE: (email: string, roles: string[]) =>
    createPortalError(
      'UNRECOGNIZED_ROLE',
      `${email} has unrecognized roles: ${roles.join(', ')}`,
      403,
      'Invalid role assignment. Please contact your administrator.',
      { email, roles }
    ),

  ROUTING_MISCONFIGURATION: (role: string) =>
    createPortalError(
      'ROUTING_MISCONFIGURATION',
      `No backend configured for role ${role}`,
      500,
      'Service configuration error. Please contact support.',
      { role }
    ),

  BACKEND_UNAVAILABLE: (role: string, target: string, cause: string) =>
    createPortalError(
      'BACKEND_UNAVAILABLE',
      `Connection to ${target} failed: ${cause}`,
      503,
      `The ${role} dashboard is currently unavailable. Please try again later.`,
      { role, target }
    ),

  BACKEND_TIMEOUT: (role: string, target: string, timeoutMs: number) =>
    createPortalError(
      'BACKEND_TIMEOUT',
      `No response from ${target} within ${timeoutMs}ms`,
      504,
      `The ${role} dashboard is taking too long to respond. Please try again later.`,
      { role, target, timeoutMs }
    ),

  PROXY_INTERNAL_ERROR: (target: string, cause: string) =>
    createPortalError(
      'PROXY_INTERNAL_ERROR',
      `Unexpected error proxying to ${target}: ${cause}`,
      500,
      'An unexpected error occurred. Please contact support.',
      { target }
    ),
} as const;

// Error sanitization for logging
export function sanitizeError(error: unknown): Record<string, unknown> {
  if (error instanceof PortalError) {
    return {
      type: 'PortalError',
      code: error.code,
      message: error.message,
      statusCode: error.statusCode,
      // Details carry usernames and group lists
      ...(process.env.NODE_ENV !== 'production' && { details: error.details }),
    };
  }

  if (error instanceof Error) {
    return {
      type: 'Error',
      message: error.message,
      name: error.name,
      ...(process.env.NODE_ENV === 'development' && { stack: error.stack }),
    };
  }

  return {
    type: 'Unknown',
    message: 'An unknown error occurred',
  };
}

/** Message of an unknown thrown value. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
