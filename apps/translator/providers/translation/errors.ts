export type TranslationErrorKind =
  | "configuration"
  | "authentication"
  | "network"
  | "remote-api"
  | "unexpected";

export abstract class TranslationError extends Error {
  abstract readonly kind: TranslationErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends TranslationError {
  readonly kind = "configuration";
}

export class AuthenticationError extends TranslationError {
  readonly kind = "authentication";
}

export class NetworkError extends TranslationError {
  readonly kind = "network";
}

export class RemoteAPIError extends TranslationError {
  readonly kind = "remote-api";

  constructor(
    message: string,
    readonly code: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class UnexpectedError extends TranslationError {
  readonly kind = "unexpected";
}

export const isTranslationError = (value: unknown): value is TranslationError =>
  value instanceof TranslationError;

export const describeCause = (cause: unknown): string => {
  if (!(cause instanceof Error)) {
    return String(cause);
  }
  // undici reports "fetch failed" and keeps the socket error as its cause.
  if (cause.cause instanceof Error && cause.cause.message) {
    return `${cause.message}: ${cause.cause.message}`;
  }
  return cause.message;
};
