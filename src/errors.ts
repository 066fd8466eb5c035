import { inspect } from "node:util";

export type ForumErrorCode =
  | "ERR_HTTP_ERROR"
  | "ERR_NON_HTML_CONTENT"
  | "ERR_FETCH_FAILED"
  | "ERR_LOGIN_REQUIRED"
  | "ERR_POST_NOT_FOUND"
  | "ERR_INVALID_CONFIG";

export interface ForumErrorDetails {
  name: string;
  message: string;
  code?: string | number;
  statusCode?: number;
  originalError?: ForumErrorDetails;
}

/**
 * Error raised by the forum fetch layer and configuration loader.
 * The extraction core never throws; everything upstream of it reports through this class.
 */
export class ForumError extends Error {
  public readonly code?: ForumErrorCode;
  /** Error this one wraps, e.g. the rejection from `fetch`. */
  public readonly originalError?: Error;
  public readonly statusCode?: number;

  constructor(message: string, code?: ForumErrorCode, originalError?: Error, statusCode?: number) {
    super(message);
    this.name = "ForumError";
    this.code = code;
    this.originalError = originalError;
    this.statusCode = statusCode;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ForumError);
    }
  }

  /** Name, message, code, status and the nested cause; no stack. */
  toObject(): ForumErrorDetails {
    const descriptor: ForumErrorDetails = {
      name: this.name,
      message: this.message,
    };

    if (this.code !== undefined) {
      descriptor.code = this.code;
    }

    if (this.statusCode !== undefined) {
      descriptor.statusCode = this.statusCode;
    }

    const original = serializeUnknownError(this.originalError);
    if (original) {
      descriptor.originalError = original;
    }

    return descriptor;
  }

  toJSON(): ForumErrorDetails {
    return this.toObject();
  }

  [inspect.custom](): ForumErrorDetails {
    return this.toObject();
  }
}

/**
 * Raised when the forum answers with a non-2xx status.
 */
export class ForumHttpError extends ForumError {
  constructor(
    message: string,
    public readonly statusCode: number
  ) {
    super(message, "ERR_HTTP_ERROR", undefined, statusCode);
    this.name = "ForumHttpError";
  }
}

function readField(value: object, key: string): unknown {
  return key in value ? Reflect.get(value, key) : undefined;
}

function serializeUnknownError(error: unknown): ForumErrorDetails | undefined {
  if (!error) {
    return undefined;
  }

  if (error instanceof ForumError) {
    return error.toObject();
  }

  if (typeof error === "object") {
    const name = readField(error, "name");
    const message = readField(error, "message");
    const descriptor: ForumErrorDetails = {
      name: typeof name === "string" && name ? name : "Error",
      message: typeof message === "string" ? message : String(error),
    };

    const withCode = readField(error, "code");
    if (typeof withCode === "string" || typeof withCode === "number") {
      descriptor.code = withCode;
    }

    const withStatus = readField(error, "statusCode") ?? readField(error, "status");
    if (typeof withStatus === "number") {
      descriptor.statusCode = withStatus;
    }

    const nestedDescriptor = serializeUnknownError(readField(error, "originalError"));
    if (nestedDescriptor) {
      descriptor.originalError = nestedDescriptor;
    }

    return descriptor;
  }

  return {
    name: "Error",
    message: typeof error === "string" ? error : String(error),
  };
}

/** Normalises a caught value into an `Error` for wrapping. */
export function toError(error: unknown): Error | undefined {
  return error instanceof Error ? error : undefined;
}
