import { readTextraEnv } from "../../config/env";
import type { TranslateOptions, TranslationProvider } from "./base";
import { TextraTranslationProvider } from "./textra";
import { TokenManager } from "./token-manager";

let defaultProvider: TranslationProvider | null = null;

export const createTextraTranslationProvider = (
  env: Record<string, string | undefined> = process.env
): TextraTranslationProvider => {
  const config = readTextraEnv(env);
  const tokens = new TokenManager(config, { requestTimeoutMs: config.requestTimeoutMs });
  return new TextraTranslationProvider(config, tokens);
};

/**
 * The process-wide provider. Its token cache lives as long as the process,
 * or until {@link resetTranslationProvider}.
 */
export const getTranslationProvider = (): TranslationProvider => {
  if (!defaultProvider) {
    defaultProvider = createTextraTranslationProvider();
  }
  return defaultProvider;
};

export const resetTranslationProvider = (): void => {
  defaultProvider = null;
};

export const translateJaToEn = (text: string, options?: TranslateOptions): Promise<string> =>
  getTranslationProvider().translate(text, options);

export type { TranslateOptions, TranslationDirection, TranslationProvider } from "./base";
export * from "./errors";
export { TextraTranslationProvider } from "./textra";
export { TokenCache, TokenManager } from "./token-manager";
