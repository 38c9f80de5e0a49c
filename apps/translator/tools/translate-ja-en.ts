import { logServerEvent } from '../lib/logging/server';
import { isTranslationError, translateJaToEn } from '../providers/translation';
import type { TranslationErrorKind } from '../providers/translation';

export const TRANSLATE_JA_TO_EN_TOOL = {
  name: 'translate_ja_to_en',
  description:
    'Translates Japanese text to English. When a request arrives in Japanese, translate it first and treat the English text as the original request.',
} as const;

const failureMessages: Record<TranslationErrorKind | 'unknown', string> = {
  configuration: 'Translation failed due to a configuration issue. Please check the server setup.',
  authentication: 'Translation failed due to an API error. Please try again later.',
  'remote-api': 'Translation failed due to an API error. Please try again later.',
  network: 'Translation failed due to a network issue. Please check your connection or try again later.',
  unexpected: 'An unexpected error occurred during translation. Please try again.',
  unknown: 'An unexpected error occurred during translation. Please try again.',
};

export function describeTranslationFailure(error: unknown): string {
  return failureMessages[isTranslationError(error) ? error.kind : 'unknown'];
}

export interface TranslateToolResult {
  ok: boolean;
  text: string;
}

export interface TranslateToolDeps {
  translate?: (text: string) => Promise<string>;
}

/**
 * Entry point for callers that expect a string back in every case: the
 * translation on success, a user-facing message otherwise.
 */
export async function runTranslateJaToEnTool(
  text: string,
  deps: TranslateToolDeps = {}
): Promise<TranslateToolResult> {
  const translate = deps.translate ?? translateJaToEn;
  try {
    const translated = await translate(text);
    void logServerEvent({
      level: 'info',
      category: 'translation:tool',
      message: 'Successfully translated text',
      details: { source: text, translated },
    });
    return { ok: true, text: translated };
  } catch (error) {
    void logServerEvent({
      level: 'error',
      category: 'translation:tool',
      message: `${TRANSLATE_JA_TO_EN_TOOL.name} failed`,
      details: { kind: isTranslationError(error) ? error.kind : 'unknown', error },
    });
    return { ok: false, text: describeTranslationFailure(error) };
  }
}
