import { normalizeTranscriptWhitespace, type TranscriptFetcher, type TranscriptSegment } from '../transcript/types';
import { NO_TRANSCRIPT_MESSAGE, classifyCaptionFailure } from './classifyError';
import { DEFAULT_LANGUAGE, makeCaptionError, type CaptionResponse, type CaptionResult } from './types';

export function buildCaptionResponse(
  videoId: string,
  segments: TranscriptSegment[],
  language: string | null,
): CaptionResponse {
  const texts: string[] = [];
  let totalDuration = 0;
  for (const segment of segments) {
    texts.push(segment.text);
    const segmentEnd = (segment.start ?? 0) + (segment.duration ?? 0);
    if (segmentEnd > totalDuration) totalDuration = segmentEnd;
  }

  return {
    video_id: videoId,
    captions: normalizeTranscriptWhitespace(texts.join(' ')),
    language: language || DEFAULT_LANGUAGE,
    total_duration: totalDuration,
  };
}

/**
 * Fetches the transcript for an already-normalized video id and turns it into
 * a caption response or a classified error. The fetcher is expected to resolve
 * with a result union; a rejection is still classified rather than rethrown.
 */
export async function fetchCaptions(videoId: string, fetcher: TranscriptFetcher): Promise<CaptionResult> {
  try {
    const result = await fetcher(videoId);
    if (!result.ok) {
      if (result.reason === 'NO_TRANSCRIPT') {
        return { ok: false, error: makeCaptionError('NO_TRANSCRIPT_AVAILABLE', NO_TRANSCRIPT_MESSAGE, videoId) };
      }
      return { ok: false, error: classifyCaptionFailure(result.message, videoId) };
    }
    return { ok: true, response: buildCaptionResponse(videoId, result.segments, result.language) };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error ?? 'Unknown error');
    return { ok: false, error: classifyCaptionFailure(message, videoId) };
  }
}
