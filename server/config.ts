import type { TranscriptProvider } from './transcript/types';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type ServerConfig = {
  port: number;
  logLevel: LogLevel;
  transcriptProvider: TranscriptProvider;
  transcriptTimeoutMs: number;
  /** Preferred caption language; providers fall back to their own default when unset. */
  transcriptLanguage: string | null;
  corsOrigin: string | string[];
  jsonBodyLimit: string;
};

type Env = Record<string, string | undefined>;

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];
const TRANSCRIPT_PROVIDERS: readonly TranscriptProvider[] = ['youtube_transcript', 'yt_to_text', 'youtube_timedtext'];

export const DEFAULT_PORT = 5000;
export const DEFAULT_TRANSCRIPT_TIMEOUT_MS = 15_000;

export function clampInt(raw: unknown, fallback: number, min: number, max: number) {
  if (raw === undefined || raw === null || raw === '') return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) return fallback;
  return Math.min(max, Math.max(min, Math.floor(parsed)));
}

function pickOne<T extends string>(raw: string | undefined, allowed: readonly T[], fallback: T): T {
  const normalized = String(raw ?? '').trim().toLowerCase();
  return allowed.find((value) => value === normalized) ?? fallback;
}

export function resolveTranscriptProvider(raw: string | undefined): TranscriptProvider {
  return pickOne(raw, TRANSCRIPT_PROVIDERS, 'youtube_transcript');
}

function parseCorsOrigin(raw: string | undefined): string | string[] {
  const origins = String(raw ?? '')
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);
  if (origins.length === 0 || origins.includes('*')) return '*';
  return origins;
}

export function loadServerConfig(env: Env = process.env): ServerConfig {
  const language = env.TRANSCRIPT_LANGUAGE?.trim();
  return Object.freeze({
    port: clampInt(env.PORT, DEFAULT_PORT, 0, 65_535),
    logLevel: pickOne(env.LOG_LEVEL, LOG_LEVELS, 'info'),
    transcriptProvider: resolveTranscriptProvider(env.TRANSCRIPT_PROVIDER),
    transcriptTimeoutMs: clampInt(env.TRANSCRIPT_TIMEOUT_MS, DEFAULT_TRANSCRIPT_TIMEOUT_MS, 1000, 90_000),
    transcriptLanguage: language ? language : null,
    corsOrigin: parseCorsOrigin(env.CORS_ORIGIN),
    jsonBodyLimit: env.JSON_BODY_LIMIT?.trim() || '1mb',
  });
}
