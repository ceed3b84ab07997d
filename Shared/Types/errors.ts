/**
 * Base error class for the mailroom services.
 * Carries a machine-readable code and optional details alongside the message.
 */
export class BaseError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'BaseError';
    // Keep instanceof working for subclasses after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Missing or invalid configuration (env vars, schema failures)
 */
export class ConfigurationError extends BaseError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Tool input that failed schema validation
 */
export class ValidationError extends BaseError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

/**
 * A tabular knowledge file that is missing, unreadable or lacks required columns
 */
export class KnowledgeSourceError extends BaseError {
  constructor(message: string, details?: unknown) {
    super(message, 'KNOWLEDGE_SOURCE_ERROR', details);
    this.name = 'KnowledgeSourceError';
  }
}

/**
 * Any failure talking to the mail provider. Transient and permanent failures
 * are not told apart.
 */
export class MailGatewayError extends BaseError {
  constructor(message: string, details?: unknown) {
    super(message, 'MAIL_GATEWAY_ERROR', details);
    this.name = 'MailGatewayError';
  }
}

/**
 * OAuth problems: no client secret, consent denied, no refresh token granted
 */
export class AuthorizationError extends BaseError {
  constructor(message: string, details?: unknown) {
    super(message, 'AUTHORIZATION_ERROR', details);
    this.name = 'AuthorizationError';
  }
}

/**
 * Message of an unknown thrown value, for places that surface errors as text.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}
