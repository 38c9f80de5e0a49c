import { nanoid } from "nanoid";
import type { TextraEnvConfig } from "../../config/env";
import { logServerEvent } from "../../lib/logging/server";
import type {
  AccessTokenSource,
  FetchLike,
  TextraResponse,
  TranslateOptions,
  TranslationDirection,
  TranslationProvider,
} from "./base";
import {
  ConfigurationError,
  NetworkError,
  RemoteAPIError,
  UnexpectedError,
  describeCause,
  isTranslationError,
} from "./errors";

export type TextraSettings = Pick<
  TextraEnvConfig,
  "apiKey" | "userName" | "translateUrl" | "requestTimeoutMs"
>;

export interface TextraProviderOptions {
  fetch?: FetchLike;
}

const isTextraResponse = (value: unknown): value is TextraResponse =>
  typeof value === "object" && value !== null && !Array.isArray(value);

interface TextraHttpReply {
  status: number;
  body: string;
}

/**
 * Japanese to English machine translation through the Textra
 * "generalNT_ja_en" endpoint.
 */
export class TextraTranslationProvider implements TranslationProvider {
  readonly name = "textra";
  readonly label = "Textra (NICT) generalNT";
  readonly direction: TranslationDirection = "ja-en";

  private readonly fetchImpl: FetchLike;

  constructor(
    private readonly settings: TextraSettings,
    private readonly tokens: AccessTokenSource,
    options: TextraProviderOptions = {}
  ) {
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async translate(text: string, options: TranslateOptions = {}): Promise<string> {
    const { apiKey, userName, translateUrl } = this.settings;
    if (!translateUrl || !userName || !apiKey) {
      void logServerEvent({
        level: "error",
        category: "translation:textra",
        message: "API URL, user name, or API key is not configured",
      });
      throw new ConfigurationError("API URL, user name, and API key must be configured");
    }

    // Token failures are already classified and reach the caller as they are.
    const accessToken = await this.tokens.getToken();
    const requestId = options.requestId ?? nanoid();

    try {
      const reply = await this.post(accessToken, text, requestId, options.abortSignal);
      return this.readResult(reply, requestId);
    } catch (error) {
      if (isTranslationError(error)) {
        throw error;
      }
      void logServerEvent({
        level: "error",
        category: "translation:textra",
        message: "Error during translation",
        details: { requestId, error },
      });
      throw new UnexpectedError(`Error during translation: ${describeCause(error)}`, {
        cause: error,
      });
    }
  }

  private async post(
    accessToken: string,
    text: string,
    requestId: string,
    abortSignal: AbortSignal | undefined
  ): Promise<TextraHttpReply> {
    const { apiKey, userName, translateUrl, requestTimeoutMs } = this.settings;
    const form = new URLSearchParams({
      access_token: accessToken,
      key: apiKey,
      name: userName,
      type: "json",
      text,
    });

    void logServerEvent({
      level: "info",
      category: "translation:textra",
      message: "Sending translation request",
      details: { requestId, url: translateUrl, characters: text.length },
    });

    const timeout = AbortSignal.timeout(requestTimeoutMs);
    const signal = abortSignal ? AbortSignal.any([timeout, abortSignal]) : timeout;

    // The body is read here too: a connection dropped mid-body is a transport failure.
    try {
      const response = await this.fetchImpl(translateUrl, {
        method: "POST",
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        body: form.toString(),
        signal,
      });
      return { status: response.status, body: await response.text() };
    } catch (error) {
      void logServerEvent({
        level: "error",
        category: "translation:textra",
        message: "Network error during translation",
        details: { requestId, error },
      });
      throw new NetworkError(`Network error during translation: ${describeCause(error)}`, {
        cause: error,
      });
    }
  }

  private readResult(reply: TextraHttpReply, requestId: string): string {
    const payload: unknown = JSON.parse(reply.body);
    if (!isTextraResponse(payload)) {
      throw new Error(`Unexpected response body (status ${reply.status})`);
    }

    const resultset = payload.resultset ?? {};
    const code = String(resultset.code);
    if (code !== "0") {
      const message = resultset.message ?? "Unknown error";
      void logServerEvent({
        level: "error",
        category: "translation:textra",
        message: "Translation API returned an error",
        details: { requestId, code, remoteMessage: message, status: reply.status },
      });
      throw new RemoteAPIError(`Translation API error: ${message} (code: ${code})`, code);
    }

    const translated = resultset.result?.text ?? "";
    if (!translated) {
      void logServerEvent({
        level: "warn",
        category: "translation:textra",
        message: "Translation result is empty",
        details: { requestId },
      });
    } else {
      void logServerEvent({
        level: "info",
        category: "translation:textra",
        message: "Translation successful",
        details: { requestId, characters: translated.length },
      });
    }
    return translated;
  }
}
