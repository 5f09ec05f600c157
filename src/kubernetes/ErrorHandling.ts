/**
 * Error Handling Module
 *
 * Typed errors for the Kubernetes API layer and for report aggregation,
 * plus conversion of raw client failures into the typed hierarchy.
 */

/**
 * Base error class for all Kubernetes-related errors
 */
export class KubernetesError extends Error {
  public readonly code: string;
  public readonly statusCode?: number;
  public readonly details: Record<string, unknown>;

  constructor(message: string, code: string, statusCode?: number, details?: Record<string, unknown>) {
    super(message);
    this.name = 'KubernetesError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details || {};

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, KubernetesError.prototype);
  }
}

/**
 * Error thrown when authentication fails
 */
export class AuthenticationError extends KubernetesError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'AUTHENTICATION_ERROR', 401, details || {});
    this.name = 'AuthenticationError';
    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }
}

/**
 * Error thrown when authorization fails
 */
export class AuthorizationError extends KubernetesError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'AUTHORIZATION_ERROR', 403, details || {});
    this.name = 'AuthorizationError';
    Object.setPrototypeOf(this, AuthorizationError.prototype);
  }
}

/**
 * Error thrown when a resource is not found
 */
export class ResourceNotFoundError extends KubernetesError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'RESOURCE_NOT_FOUND', 404, details || {});
    this.name = 'ResourceNotFoundError';
    Object.setPrototypeOf(this, ResourceNotFoundError.prototype);
  }
}

/**
 * Error thrown when the server is unavailable
 */
export class ServerUnavailableError extends KubernetesError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SERVER_UNAVAILABLE', 503, details || {});
    this.name = 'ServerUnavailableError';
    Object.setPrototypeOf(this, ServerUnavailableError.prototype);
  }
}

/**
 * Error thrown for network-related issues
 */
export class NetworkError extends KubernetesError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NETWORK_ERROR', undefined, details || {});
    this.name = 'NetworkError';
    Object.setPrototypeOf(this, NetworkError.prototype);
  }
}

/**
 * Base class for failures while shaping collected data into the report.
 * These abort the collection cycle; nothing is emitted after one is raised.
 */
export class AggregationError extends Error {
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'AggregationError';
    this.code = code;
    Object.setPrototypeOf(this, AggregationError.prototype);
  }
}

/**
 * A quantity string whose numeric part is not a number
 */
export class MalformedQuantityError extends AggregationError {
  public readonly quantity: string;

  constructor(quantity: string) {
    super(`Malformed quantity: '${quantity}'`, 'MALFORMED_QUANTITY');
    this.name = 'MalformedQuantityError';
    this.quantity = quantity;
    Object.setPrototypeOf(this, MalformedQuantityError.prototype);
  }
}

/**
 * A fold over zero records without a seed
 */
export class EmptyAggregationError extends AggregationError {
  constructor(what: string = 'records') {
    super(`Cannot aggregate an empty list of ${what} without a seed`, 'EMPTY_AGGREGATION');
    this.name = 'EmptyAggregationError';
    Object.setPrototypeOf(this, EmptyAggregationError.prototype);
  }
}

/**
 * A scalar key inserted twice into the same section
 */
export class DuplicateKeyError extends AggregationError {
  public readonly key: string;

  constructor(key: string) {
    super(`Key ${key} is already present and cannot be merged`, 'DUPLICATE_KEY');
    this.name = 'DuplicateKeyError';
    this.key = key;
    Object.setPrototypeOf(this, DuplicateKeyError.prototype);
  }
}

/**
 * Two metric records for different described objects were combined
 */
export class IdentityMismatchError extends AggregationError {
  constructor(left: string, right: string) {
    super(`Cannot combine metrics of ${left} with metrics of ${right}`, 'IDENTITY_MISMATCH');
    this.name = 'IdentityMismatchError';
    Object.setPrototypeOf(this, IdentityMismatchError.prototype);
  }
}

/**
 * Kubelet statistics that carry no usable sample
 */
export class MalformedStatsError extends AggregationError {
  constructor(message: string) {
    super(message, 'MALFORMED_STATS');
    this.name = 'MalformedStatsError';
    Object.setPrototypeOf(this, MalformedStatsError.prototype);
  }
}

/**
 * Invalid command line or environment
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function stringField(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Convert Kubernetes API errors to typed errors
 */
export function convertApiError(error: unknown): KubernetesError {
  if (error instanceof KubernetesError) {
    return error;
  }

  if (!isRecord(error)) {
    return new KubernetesError(String(error), 'UNKNOWN_ERROR');
  }

  // HttpError from the client carries the response and the decoded V1Status body
  const response = isRecord(error.response) ? error.response : undefined;
  const statusCode =
    typeof error.statusCode === 'number'
      ? error.statusCode
      : typeof response?.statusCode === 'number'
        ? response.statusCode
        : undefined;

  if (statusCode !== undefined) {
    const body = isRecord(error.body) ? error.body : {};
    const message =
      stringField(body, 'message') ||
      stringField(body, 'reason') ||
      stringField(error, 'message') ||
      `HTTP ${statusCode}`;

    const details = {
      kind: body.kind,
      apiVersion: body.apiVersion,
      reason: body.reason,
      code: body.code,
    };

    switch (statusCode) {
      case 401:
        return new AuthenticationError(message, details);
      case 403:
        return new AuthorizationError(message, details);
      case 404:
        return new ResourceNotFoundError(message, details);
      case 500:
      case 502:
      case 503:
      case 504:
        return new ServerUnavailableError(message, details);
      default:
        return new KubernetesError(message, 'API_ERROR', statusCode, details);
    }
  }

  // Handle network errors
  const code = stringField(error, 'code');
  const message = stringField(error, 'message') || 'Unknown error';
  if (code === 'ECONNREFUSED' || code === 'ENOTFOUND' || code === 'ETIMEDOUT') {
    return new NetworkError(message, { code });
  }

  return new KubernetesError(message, 'UNKNOWN_ERROR', undefined, {
    originalError: String(error),
  });
}
