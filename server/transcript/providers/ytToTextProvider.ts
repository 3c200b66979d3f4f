import { z } from 'zod';
import {
  TranscriptProviderError,
  normalizeTranscriptWhitespace,
  toSeconds,
  type ProviderOptions,
  type ProviderTranscript,
  type TranscriptSegment,
} from '../types';

const YT_TO_TEXT_URL = 'https://yt-to-text.com/api/v1/Subtitles';

const YtToTextPayloadSchema = z.object({
  data: z.object({
    transcripts: z.array(
      z.object({
        t: z.unknown().optional(),
        s: z.unknown().optional(),
        e: z.unknown().optional(),
      }),
    ),
  }),
});

function toSegment(item: { t?: unknown; s?: unknown; e?: unknown }): TranscriptSegment {
  const start = toSeconds(item.s);
  const end = toSeconds(item.e);
  return {
    text: typeof item.t === 'string' ? normalizeTranscriptWhitespace(item.t) : '',
    start,
    duration: start !== undefined && end !== undefined && end >= start ? end - start : undefined,
  };
}

export async function getTranscriptFromYtToText(
  videoId: string,
  options: ProviderOptions = {},
): Promise<ProviderTranscript> {
  const response = await fetch(YT_TO_TEXT_URL, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
      'x-app-version': '1.0',
      'x-source': 'tubetranscript',
    },
    body: JSON.stringify({ video_id: videoId }),
    signal: options.signal,
  });

  if (response.status === 403 || response.status === 404) {
    throw new TranscriptProviderError('NO_CAPTIONS', 'Transcript unavailable for this video.');
  }
  if (!response.ok) {
    throw new TranscriptProviderError('TRANSCRIPT_FETCH_FAIL', `Transcript provider returned HTTP ${response.status}.`);
  }

  const payload: unknown = await response.json().catch(() => null);
  const parsed = YtToTextPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    throw new TranscriptProviderError('NO_CAPTIONS', 'Transcript unavailable for this video.');
  }

  const segments = parsed.data.data.transcripts
    .map(toSegment)
    .filter((segment) => segment.text.length > 0);

  // yt-to-text does not report the track language
  return { segments, language: null };
}
