import type { ServerConfig } from '../config';
import { getTranscriptFromYoutubeTranscript } from './providers/youtubeTranscriptProvider';
import { getTranscriptFromYouTubeTimedtext } from './providers/youtubeTimedtextProvider';
import { getTranscriptFromYtToText } from './providers/ytToTextProvider';
import {
  TranscriptProviderError,
  type ProviderOptions,
  type ProviderTranscript,
  type TranscriptFetchResult,
  type TranscriptFetcher,
  type TranscriptProvider,
} from './types';

type ProviderCall = (videoId: string, options: ProviderOptions) => Promise<ProviderTranscript>;

const providers: Record<TranscriptProvider, ProviderCall> = {
  youtube_transcript: getTranscriptFromYoutubeTranscript,
  yt_to_text: getTranscriptFromYtToText,
  youtube_timedtext: getTranscriptFromYouTubeTimedtext,
};

export async function withTimeout<T>(promise: Promise<T>, ms: number, onTimeout?: () => void): Promise<T> {
  let timeoutHandle: ReturnType<typeof setTimeout> | undefined;
  try {
    return await Promise.race([
      promise,
      new Promise<T>((_resolve, reject) => {
        timeoutHandle = setTimeout(() => {
          onTimeout?.();
          reject(new TranscriptProviderError('TIMEOUT', 'Transcript request timed out.'));
        }, ms);
      }),
    ]);
  } finally {
    if (timeoutHandle) clearTimeout(timeoutHandle);
  }
}

export function toFetchResult(error: unknown): TranscriptFetchResult {
  if (error instanceof TranscriptProviderError) {
    if (error.code === 'NO_CAPTIONS' || error.code === 'TRANSCRIPT_EMPTY') {
      return { ok: false, reason: 'NO_TRANSCRIPT', message: error.message };
    }
    return { ok: false, reason: 'FAILED', message: error.message };
  }
  const message = error instanceof Error ? error.message : String(error ?? 'Unknown error');
  return { ok: false, reason: 'FAILED', message };
}

/**
 * Wraps a provider call into a fetcher that never rejects: every outcome,
 * timeouts included, comes back as a `TranscriptFetchResult`. On timeout the
 * provider's signal is aborted so its upstream requests stop as well.
 */
export function wrapProvider(call: ProviderCall, timeoutMs: number, options: ProviderOptions = {}): TranscriptFetcher {
  return async (videoId) => {
    const controller = new AbortController();
    try {
      const transcript = await withTimeout(
        call(videoId, { ...options, signal: controller.signal }),
        timeoutMs,
        () => controller.abort(),
      );
      return { ok: true, segments: transcript.segments, language: transcript.language };
    } catch (error) {
      return toFetchResult(error);
    }
  };
}

export function createTranscriptFetcher(
  config: Pick<ServerConfig, 'transcriptProvider' | 'transcriptTimeoutMs' | 'transcriptLanguage'>,
): TranscriptFetcher {
  const options: ProviderOptions = config.transcriptLanguage ? { language: config.transcriptLanguage } : {};
  return wrapProvider(providers[config.transcriptProvider], config.transcriptTimeoutMs, options);
}
