/**
 * dorkscan Error Classes
 *
 * Typed error hierarchy for scan operations. Only ConfigurationError is fatal
 * to a run; the other kinds are caught at the component boundary and logged.
 */

export interface BaseErrorContext {
  message?: string;
  code?: string;
  statusCode?: number;
  original?: Error | unknown;
  description?: string;
  suggestion?: string;
  retriable?: boolean;
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  code?: string;
  statusCode?: number;
  thrownAt: Date;
  retriable: boolean;
  suggestion?: string;
  description?: string;
  data: Record<string, unknown>;
  original?: unknown;
  stack?: string;
}

export class BaseError extends Error {
  thrownAt: Date;
  code?: string;
  statusCode: number;
  original?: Error | unknown;
  description?: string;
  suggestion?: string;
  retriable: boolean;
  data: Record<string, unknown>;

  constructor(context: BaseErrorContext) {
    const {
      message = 'Unknown error',
      code,
      statusCode,
      original,
      description,
      suggestion,
      retriable,
      ...rest
    } = context;

    super(message);

    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, this.constructor);
    }

    this.name = this.constructor.name;
    this.thrownAt = new Date();
    this.code = code;
    this.statusCode = statusCode ?? 500;
    this.original = original;
    this.description = description;
    this.suggestion = suggestion;
    this.retriable = retriable ?? false;
    this.data = { ...rest };
  }

  toJSON(): SerializedError {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      thrownAt: this.thrownAt,
      retriable: this.retriable,
      suggestion: this.suggestion,
      description: this.description,
      data: this.data,
      original: this.original instanceof Error ? this.original.message : this.original,
      stack: this.stack,
    };
  }

  override toString(): string {
    return `${this.name} | ${this.message}`;
  }
}

export interface DorkscanErrorDetails {
  original?: Error | unknown;
  statusCode?: number;
  retriable?: boolean;
  suggestion?: string;
  description?: string;
  [key: string]: unknown;
}

export class DorkscanError extends BaseError {
  constructor(message: string, details: DorkscanErrorDetails = {}) {
    let code: string | undefined;
    const { original } = details;
    if (original instanceof Error) {
      code = 'code' in original && typeof original.code === 'string' ? original.code : original.name;
    }

    super({ message, code, ...details });
  }
}

/**
 * Missing or unusable run configuration: absent catalog, empty catalog,
 * out-of-range options. Raised before any network activity.
 */
export class ConfigurationError extends DorkscanError {
  constructor(message: string, details: DorkscanErrorDetails = {}) {
    super(message, {
      statusCode: details.statusCode ?? 400,
      retriable: false,
      suggestion: details.suggestion ?? 'Fix the catalog file or the scan options and run again.',
      ...details,
    });
  }
}

export interface BackendErrorDetails extends DorkscanErrorDetails {
  provider: string;
  query: string;
  status?: number;
}

export class BackendError extends DorkscanError {
  provider: string;
  query: string;
  status?: number;

  constructor(message: string, details: BackendErrorDetails) {
    super(message, {
      statusCode: details.status ?? 502,
      retriable: details.retriable ?? true,
      description: details.description ?? 'The search backend request failed; the chain falls through to the next provider.',
      ...details,
    });
    this.provider = details.provider;
    this.query = details.query;
    this.status = details.status;
  }
}

export interface FetchErrorDetails extends DorkscanErrorDetails {
  url: string;
  status?: number;
}

export class FetchError extends DorkscanError {
  url: string;
  status?: number;

  constructor(message: string, details: FetchErrorDetails) {
    super(message, {
      statusCode: details.status ?? 502,
      retriable: false,
      ...details,
    });
    this.url = details.url;
    this.status = details.status;
  }
}

export interface PersistenceErrorDetails extends DorkscanErrorDetails {
  path: string;
}

export class PersistenceError extends DorkscanError {
  path: string;

  constructor(message: string, details: PersistenceErrorDetails) {
    super(message, {
      statusCode: 500,
      retriable: false,
      suggestion: details.suggestion ?? 'Check free disk space and write permissions on the output directory.',
      ...details,
    });
    this.path = details.path;
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message || err.name || 'unknown error';
  }
  return String(err) || 'unknown error';
}
