import { afterEach, describe, expect, it } from 'vitest';
import { createApp } from '../../server/app';
import { loadServerConfig } from '../../server/config';
import { createLogger, type Logger } from '../../server/logger';
import type { TranscriptFetcher } from '../../server/transcript/types';
import { failingFetcher, segmentsFetcher } from './helpers/fakeFetcher';
import { startTestServer, type TestServer } from './helpers/testServer';

let server: TestServer | null = null;

async function serve(
  fetcher: TranscriptFetcher,
  env: Record<string, string> = {},
  logger: Logger = createLogger('silent'),
) {
  const app = createApp(loadServerConfig(env), { fetcher, logger });
  server = await startTestServer(app);
  return server.baseUrl;
}

function postCaptions(baseUrl: string, body: string) {
  return fetch(`${baseUrl}/get-captions`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body,
  });
}

const helloWorld = () =>
  segmentsFetcher([
    { text: 'hello', start: 0, duration: 1 },
    { text: 'world', start: 1, duration: 2 },
  ]);

afterEach(async () => {
  if (server) await server.close();
  server = null;
});

describe('health endpoints', () => {
  it('serves the service summary at the root', async () => {
    const baseUrl = await serve(helloWorld());
    const res = await fetch(`${baseUrl}/`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      status: 'healthy',
      service: 'YouTube Caption Extractor',
      version: '1.0.0',
      endpoints: {
        get_captions: '/get-captions',
        captions_by_path: '/video/{video_id}/captions',
        health: '/health',
      },
    });
  });

  it('serves a short health payload with open CORS', async () => {
    const baseUrl = await serve(helloWorld());
    const res = await fetch(`${baseUrl}/health`, { headers: { Origin: 'https://automation.example' } });
    expect(res.status).toBe(200);
    expect(res.headers.get('access-control-allow-origin')).toBe('*');
    expect(await res.json()).toEqual({ status: 'ok', service: 'youtube-caption-extractor', version: '1.0.0' });
  });
});

describe('POST /get-captions', () => {
  it('returns cleaned captions for a short url', async () => {
    const fetcher = helloWorld();
    const baseUrl = await serve(fetcher);
    const res = await postCaptions(baseUrl, JSON.stringify({ video_id: 'https://youtu.be/dQw4w9WgXcQ' }));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      video_id: 'dQw4w9WgXcQ',
      captions: 'hello world',
      language: 'en',
      total_duration: 3,
    });
    expect(fetcher).toHaveBeenCalledWith('dQw4w9WgXcQ');
  });

  it('rejects malformed ids and echoes the raw input', async () => {
    const fetcher = helloWorld();
    const baseUrl = await serve(fetcher);
    const res = await postCaptions(baseUrl, JSON.stringify({ video_id: 'not-a-valid-id!!' }));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: 'Invalid YouTube video ID format',
      error_code: 'VALIDATION_ERROR',
      video_id: 'not-a-valid-id!!',
    });
    expect(fetcher).not.toHaveBeenCalled();
  });

  it('rejects a body without a string video_id', async () => {
    const baseUrl = await serve(helloWorld());
    const res = await postCaptions(baseUrl, JSON.stringify({ video_id: 42 }));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: 'Invalid request payload: video_id must be a string.',
      error_code: 'VALIDATION_ERROR',
      video_id: null,
    });
  });

  it('rejects malformed json', async () => {
    const baseUrl = await serve(helloWorld());
    const res = await postCaptions(baseUrl, '{"video_id": ');

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: 'Invalid request payload.',
      error_code: 'VALIDATION_ERROR',
      video_id: null,
    });
  });

  it('returns 404 when no transcript exists', async () => {
    const baseUrl = await serve(failingFetcher('NO_TRANSCRIPT', 'Transcript unavailable for this video.'));
    const res = await postCaptions(baseUrl, JSON.stringify({ video_id: 'dQw4w9WgXcQ' }));

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: 'No captions/transcripts available for this video',
      error_code: 'NO_TRANSCRIPT_AVAILABLE',
      video_id: 'dQw4w9WgXcQ',
    });
  });

  it('returns 500 with the upstream message for unclassified failures', async () => {
    const baseUrl = await serve(failingFetcher('FAILED', 'Transcript provider returned HTTP 502.'));
    const res = await postCaptions(baseUrl, JSON.stringify({ video_id: 'dQw4w9WgXcQ' }));

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: 'Error processing video: Transcript provider returned HTTP 502.',
      error_code: 'PROCESSING_ERROR',
      video_id: 'dQw4w9WgXcQ',
    });
  });
});

describe('GET /video/:videoId/captions', () => {
  it('runs the same pipeline with the path value', async () => {
    const fetcher = helloWorld();
    const baseUrl = await serve(fetcher);
    const res = await fetch(`${baseUrl}/video/${encodeURIComponent('https://www.youtube.com/watch?v=dQw4w9WgXcQ')}/captions`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      video_id: 'dQw4w9WgXcQ',
      captions: 'hello world',
      language: 'en',
      total_duration: 3,
    });
  });

  it('maps private videos to 403', async () => {
    const baseUrl = await serve(failingFetcher('FAILED', 'Video is private'));
    const res = await fetch(`${baseUrl}/video/dQw4w9WgXcQ/captions`);

    expect(res.status).toBe(403);
    expect(await res.json()).toEqual({
      error: 'Video is private and captions cannot be accessed',
      error_code: 'VIDEO_PRIVATE',
      video_id: 'dQw4w9WgXcQ',
    });
  });

  it('rejects a short path value', async () => {
    const baseUrl = await serve(helloWorld());
    const res = await fetch(`${baseUrl}/video/abc/captions`);

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: 'Invalid YouTube video ID format',
      error_code: 'VALIDATION_ERROR',
      video_id: 'abc',
    });
  });
});

describe('unknown routes', () => {
  it('answers with a json 404', async () => {
    const baseUrl = await serve(helloWorld());
    const res = await fetch(`${baseUrl}/nope`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Not found', error_code: 'NOT_FOUND' });
  });
});

describe('error middleware', () => {
  it('turns an oversized body into a validation error', async () => {
    const fetcher = helloWorld();
    const baseUrl = await serve(fetcher, { JSON_BODY_LIMIT: '20b' });
    const res = await postCaptions(baseUrl, JSON.stringify({ video_id: 'dQw4w9WgXcQ', padding: 'x'.repeat(64) }));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: 'Invalid request payload.',
      error_code: 'VALIDATION_ERROR',
      video_id: null,
    });
    expect(fetcher).not.toHaveBeenCalled();
  });

  it('turns an unexpected route failure into PROCESSING_ERROR', async () => {
    const quiet = createLogger('silent');
    const logger: Logger = {
      ...quiet,
      info: (event, payload) => {
        if (event === 'captions_request_received') throw new Error('log sink unavailable');
        quiet.info(event, payload);
      },
    };
    const baseUrl = await serve(helloWorld(), {}, logger);
    const res = await fetch(`${baseUrl}/video/dQw4w9WgXcQ/captions`);

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: 'Error processing video: log sink unavailable',
      error_code: 'PROCESSING_ERROR',
      video_id: null,
    });
  });
});
