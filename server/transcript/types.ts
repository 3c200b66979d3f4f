export type TranscriptProvider = 'youtube_transcript' | 'yt_to_text' | 'youtube_timedtext';

export type TranscriptSegment = {
  text: string;
  /** Seconds from the start of the video. */
  start?: number;
  /** Seconds. */
  duration?: number;
};

export type TranscriptFetchResult =
  | { ok: true; segments: TranscriptSegment[]; language: string | null }
  | { ok: false; reason: 'NO_TRANSCRIPT' | 'FAILED'; message: string };

export type TranscriptFetcher = (videoId: string) => Promise<TranscriptFetchResult>;

export type TranscriptProviderErrorCode = 'NO_CAPTIONS' | 'TRANSCRIPT_FETCH_FAIL' | 'TRANSCRIPT_EMPTY' | 'TIMEOUT';

export class TranscriptProviderError extends Error {
  code: TranscriptProviderErrorCode;
  constructor(code: TranscriptProviderErrorCode, message: string) {
    super(message);
    this.name = 'TranscriptProviderError';
    this.code = code;
  }
}

export function normalizeTranscriptWhitespace(text: string) {
  return text.replace(/\s+/g, ' ').trim();
}

export function toSeconds(input: unknown) {
  if (input === null || input === undefined || input === '') return undefined;
  const n = Number(input);
  return Number.isFinite(n) && n >= 0 ? n : undefined;
}

export function decodeHtml(text: string) {
  return text
    .replace(/&amp;/g, '&')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&#39;/g, "'")
    .replace(/&quot;/g, '"')
    .replace(/&nbsp;/g, ' ');
}

export type ProviderOptions = {
  /** Preferred caption language, passed to providers that can choose a track. */
  language?: string;
  /** Aborted when the caller stops waiting for the transcript. */
  signal?: AbortSignal;
};

export type ProviderTranscript = {
  segments: TranscriptSegment[];
  language: string | null;
};
