export type TranslationDirection = "ja-en";

export interface TranslateOptions {
  /**
   * Correlates log lines of a single call. Generated when omitted.
   */
  requestId?: string;
  abortSignal?: AbortSignal;
}

export interface TranslationProvider {
  readonly name: string;
  /**
   * A short human-friendly label used in logs and CLI output.
   */
  readonly label: string;
  readonly direction: TranslationDirection;
  translate(text: string, options?: TranslateOptions): Promise<string>;
}

export interface AccessTokenSource {
  getToken(): Promise<string>;
}

/**
 * Shape of the token endpoint's JSON body. Only `access_token` and
 * `expires_in` are read.
 */
export interface TokenEndpointResponse {
  access_token?: string;
  expires_in?: number | string;
  token_type?: string;
}

/**
 * Shape of the translation endpoint's JSON body.
 */
export interface TextraResponse {
  resultset?: {
    code?: number | string;
    message?: string;
    request?: Record<string, unknown>;
    result?: {
      text?: string;
      information?: Record<string, unknown>;
    };
  };
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * Monotonic time in seconds.
 */
export type Clock = () => number;
