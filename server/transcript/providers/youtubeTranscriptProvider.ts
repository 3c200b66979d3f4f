import { YoutubeTranscript } from 'youtube-transcript';
import {
  TranscriptProviderError,
  toSeconds,
  type ProviderOptions,
  type ProviderTranscript,
} from '../types';

type FetchArgs = Parameters<typeof fetch>;

export type TimingUnit = 'seconds' | 'milliseconds';

/**
 * Works out the timing unit of a caption track body. srv3 tracks
 * (`<timedtext format="3">` with `<p t d>` in ms) and classic tracks
 * (`<text start dur>` in seconds) are parsed into the same offset/duration
 * fields by the client, so the unit has to come from the raw track.
 */
export function detectTimingUnit(body: string): TimingUnit | null {
  if (/<timedtext\b[^>]*\bformat="3"/.test(body) || /<p\s+t="\d/.test(body)) return 'milliseconds';
  if (/<text\s+start="/.test(body)) return 'seconds';
  return null;
}

/** A fetch for the client that is bound to `signal` and remembers the unit of the last caption track. */
export function createTrackingFetch(signal?: AbortSignal) {
  let unit: TimingUnit | null = null;

  const trackingFetch = async (...[input, init]: FetchArgs) => {
    const response = await fetch(input, { ...init, signal: signal ?? init?.signal });
    const body = await response.clone().text().catch(() => '');
    const detected = detectTimingUnit(body);
    if (detected) unit = detected;
    return response;
  };

  return { fetch: trackingFetch, timingUnit: () => unit };
}

function toProviderError(error: unknown) {
  const message = error instanceof Error ? error.message : String(error);
  const normalized = message.toLowerCase();
  if (normalized.includes('no transcripts are available')) {
    return new TranscriptProviderError('NO_CAPTIONS', message);
  }
  // removed videos are reported as "no longer available"
  if (normalized.includes('no longer available')) {
    return new TranscriptProviderError('TRANSCRIPT_FETCH_FAIL', `Video unavailable: ${message}`);
  }
  return new TranscriptProviderError('TRANSCRIPT_FETCH_FAIL', message);
}

export async function getTranscriptFromYoutubeTranscript(
  videoId: string,
  options: ProviderOptions = {},
): Promise<ProviderTranscript> {
  const tracking = createTrackingFetch(options.signal);
  let items: Awaited<ReturnType<typeof YoutubeTranscript.fetchTranscript>>;
  try {
    items = await YoutubeTranscript.fetchTranscript(videoId, {
      ...(options.language ? { lang: options.language } : {}),
      fetch: tracking.fetch,
    });
  } catch (error) {
    throw toProviderError(error);
  }

  // the client decodes entities itself, so text is passed through as is
  const scale = tracking.timingUnit() === 'milliseconds' ? 1000 : 1;
  const segments = items.map((item) => ({
    text: item.text,
    start: toSeconds(item.offset / scale),
    duration: toSeconds(item.duration / scale),
  }));
  const language = items.find((item) => item.lang)?.lang ?? options.language ?? null;

  return { segments, language };
}
