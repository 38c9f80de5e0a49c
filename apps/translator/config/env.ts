import path from "path";

export interface TextraEnvConfig {
  apiKey: string;
  apiSecret: string;
  userName: string;
  tokenUrl: string;
  translateUrl: string;
  requestTimeoutMs: number;
}

export interface LoggingEnvConfig {
  logDir: string;
}

export const DEFAULT_TEXTRA_TOKEN_URL = "https://mt-auto-minhon-mlt.ucri.jgn-x.jp/oauth2/token.php";
export const DEFAULT_TEXTRA_JA_EN_API_URL =
  "https://mt-auto-minhon-mlt.ucri.jgn-x.jp/api/mt/generalNT_ja_en/";

const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

type EnvSource = Record<string, string | undefined>;

const intFromEnv = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

/**
 * Missing credentials are left empty here; the token manager and the
 * translation provider reject them when they are first needed.
 */
export const readTextraEnv = (env: EnvSource = process.env): TextraEnvConfig => ({
  apiKey: env.TEXTRA_API_KEY ?? "",
  apiSecret: env.TEXTRA_API_SECRET ?? "",
  userName: env.TEXTRA_USER_NAME ?? "",
  tokenUrl: env.TEXTRA_TOKEN_URL ?? DEFAULT_TEXTRA_TOKEN_URL,
  translateUrl: env.TEXTRA_JA_EN_API_URL ?? DEFAULT_TEXTRA_JA_EN_API_URL,
  requestTimeoutMs: intFromEnv(env.TEXTRA_REQUEST_TIMEOUT_MS, DEFAULT_REQUEST_TIMEOUT_MS),
});

export const readLoggingEnv = (
  env: EnvSource = process.env,
  cwd: string = process.cwd()
): LoggingEnvConfig => ({
  logDir: env.SERVER_LOG_DIR || path.join(cwd, ".logs"),
});
