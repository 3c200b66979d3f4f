import type { AdapterValidateResult, BaseAdapter } from './BaseAdapter';

const YOUTUBE_ID_REGEX = /^[a-zA-Z0-9_-]{11}$/;
const WATCH_URL_MARKER = 'youtube.com/watch?v=';
const SHORT_URL_MARKER = 'youtu.be/';

export const INVALID_VIDEO_ID_MESSAGE = 'Invalid YouTube video ID format';

/**
 * Reduces a bare id, a `youtube.com/watch?v=` URL or a `youtu.be/` URL to the id.
 * The input is not trimmed or lower-cased.
 */
export function extractVideoIdCandidate(raw: string) {
  if (raw.includes(WATCH_URL_MARKER)) {
    const match = raw.match(/v=([a-zA-Z0-9_-]+)/);
    return match ? match[1] : raw;
  }
  if (raw.includes(SHORT_URL_MARKER)) {
    const match = raw.match(/youtu\.be\/([a-zA-Z0-9_-]+)/);
    return match ? match[1] : raw;
  }
  return raw;
}

export class YouTubeAdapter implements BaseAdapter {
  id = 'youtube';
  sourceType = 'youtube';

  validate(raw: string): AdapterValidateResult {
    const videoId = extractVideoIdCandidate(raw);
    if (!YOUTUBE_ID_REGEX.test(videoId)) {
      return { ok: false, errorCode: 'VALIDATION_ERROR', message: INVALID_VIDEO_ID_MESSAGE };
    }
    return { ok: true, sourceType: this.sourceType, sourceNativeId: videoId };
  }
}

const youtubeAdapter = new YouTubeAdapter();

export function normalizeVideoId(raw: string) {
  return youtubeAdapter.validate(raw);
}
