import 'dotenv/config';
import { text as readStream } from 'stream/consumers';
import { pathToFileURL } from 'url';
import { TRANSLATE_JA_TO_EN_TOOL, runTranslateJaToEnTool } from '../tools/translate-ja-en';
import type { TranslateToolResult } from '../tools/translate-ja-en';

export interface CliIo {
  readStdin: () => Promise<string>;
  write: (line: string) => void;
  run?: (text: string) => Promise<TranslateToolResult>;
}

const defaultIo: CliIo = {
  readStdin: () => readStream(process.stdin),
  write: (line) => process.stdout.write(`${line}\n`),
};

/**
 * Translates the joined arguments, or stdin when there are none, and
 * resolves to the process exit code.
 */
export async function runCli(args: string[], io: CliIo = defaultIo): Promise<number> {
  const input = args.length ? args.join(' ') : (await io.readStdin()).trim();
  if (!input) {
    io.write('Usage: translate-ja-en <japanese text>');
    io.write(TRANSLATE_JA_TO_EN_TOOL.description);
    return 2;
  }
  const run = io.run ?? runTranslateJaToEnTool;
  const result = await run(input);
  io.write(result.text);
  return result.ok ? 0 : 1;
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      // eslint-disable-next-line no-console
      console.error('[translate-ja-en] failed', error);
      process.exitCode = 1;
    }
  );
}
