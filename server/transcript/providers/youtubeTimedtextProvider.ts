import { z } from 'zod';
import {
  TranscriptProviderError,
  decodeHtml,
  normalizeTranscriptWhitespace,
  type ProviderOptions,
  type ProviderTranscript,
  type TranscriptSegment,
} from '../types';

const TIMEDTEXT_URL = 'https://www.youtube.com/api/timedtext';

const Json3PayloadSchema = z.object({
  events: z.array(
    z.object({
      tStartMs: z.number().optional(),
      dDurationMs: z.number().optional(),
      segs: z.array(z.object({ utf8: z.string().optional() })).optional(),
    }),
  ),
});

type CaptionTrack = { lang: string; name: string | null };

export function parseCaptionTracks(xml: string) {
  const tracks: CaptionTrack[] = [];
  const regex = /<track\b([^>]*)\/>/g;
  let match: RegExpExecArray | null;
  while ((match = regex.exec(xml))) {
    const attrs = match[1];
    const langMatch = attrs.match(/\blang_code="([^"]+)"/);
    if (!langMatch) continue;
    const nameMatch = attrs.match(/\bname="([^"]*)"/);
    tracks.push({ lang: langMatch[1], name: nameMatch ? decodeHtml(nameMatch[1]) : null });
  }
  return tracks;
}

export function pickCaptionTrack(tracks: CaptionTrack[], language?: string) {
  const wanted = (language || 'en').toLowerCase();
  return tracks.find((track) => track.lang.toLowerCase().startsWith(wanted)) || tracks[0];
}

export function extractSegmentsFromJson3(payload: unknown): TranscriptSegment[] | null {
  const parsed = Json3PayloadSchema.safeParse(payload);
  if (!parsed.success) return null;

  const segments: TranscriptSegment[] = [];
  for (const event of parsed.data.events) {
    if (!event.segs) continue;
    const text = normalizeTranscriptWhitespace(
      event.segs.map((seg) => decodeHtml(seg.utf8 ?? '')).join(''),
    );
    if (!text) continue;
    segments.push({
      text,
      start: event.tStartMs !== undefined ? event.tStartMs / 1000 : undefined,
      duration: event.dDurationMs !== undefined ? event.dDurationMs / 1000 : undefined,
    });
  }
  return segments;
}

export async function getTranscriptFromYouTubeTimedtext(
  videoId: string,
  options: ProviderOptions = {},
): Promise<ProviderTranscript> {
  const listUrl = `${TIMEDTEXT_URL}?type=list&v=${encodeURIComponent(videoId)}`;
  const listResponse = await fetch(listUrl, { signal: options.signal });
  if (!listResponse.ok) {
    throw new TranscriptProviderError('TRANSCRIPT_FETCH_FAIL', 'Could not fetch transcript metadata.');
  }

  const tracks = parseCaptionTracks(await listResponse.text());
  if (tracks.length === 0) {
    throw new TranscriptProviderError('NO_CAPTIONS', 'Transcript unavailable for this video.');
  }

  const preferred = pickCaptionTrack(tracks, options.language);
  const trackUrl = new URL(TIMEDTEXT_URL);
  trackUrl.searchParams.set('v', videoId);
  trackUrl.searchParams.set('lang', preferred.lang);
  trackUrl.searchParams.set('fmt', 'json3');
  if (preferred.name) trackUrl.searchParams.set('name', preferred.name);

  const trackResponse = await fetch(trackUrl.toString(), { signal: options.signal });
  if (!trackResponse.ok) {
    throw new TranscriptProviderError('TRANSCRIPT_FETCH_FAIL', 'Could not fetch transcript content.');
  }

  const payload: unknown = await trackResponse.json().catch(() => null);
  const segments = extractSegmentsFromJson3(payload);
  if (!segments) {
    throw new TranscriptProviderError('TRANSCRIPT_EMPTY', 'Transcript unavailable for this video.');
  }

  return { segments, language: preferred.lang };
}
