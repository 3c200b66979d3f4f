import express from 'express';
import cors from 'cors';
import { z } from 'zod';
import { normalizeVideoId } from './adapters/YouTubeAdapter';
import { fetchCaptions } from './captions/fetchCaptions';
import { makeCaptionError, toErrorBody, type CaptionResult } from './captions/types';
import type { ServerConfig } from './config';
import { createLogger, type Logger } from './logger';
import { createTranscriptFetcher } from './transcript/getTranscript';
import type { TranscriptFetcher } from './transcript/types';

export const SERVICE_NAME = 'YouTube Caption Extractor';
export const SERVICE_SLUG = 'youtube-caption-extractor';
export const SERVICE_VERSION = '1.0.0';

const VideoRequestSchema = z.object({
  video_id: z.string(),
});

export type AppDeps = {
  logger?: Logger;
  fetcher?: TranscriptFetcher;
};

type AsyncRoute = (req: express.Request, res: express.Response) => Promise<void>;

// express 4 does not catch rejected handlers; hand them to the error middleware
function asyncRoute(handler: AsyncRoute): express.RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

function rawVideoIdFromBody(body: unknown) {
  if (body && typeof body === 'object' && 'video_id' in body && typeof body.video_id === 'string') {
    return body.video_id;
  }
  return null;
}

export function createApp(config: ServerConfig, deps: AppDeps = {}) {
  const logger = deps.logger ?? createLogger(config.logLevel);
  const fetcher = deps.fetcher ?? createTranscriptFetcher(config);

  const app = express();
  app.disable('x-powered-by');
  app.use(cors({ origin: config.corsOrigin }));
  app.use(express.json({ limit: config.jsonBodyLimit }));

  app.use((req, res, next) => {
    const start = process.hrtime.bigint();
    res.on('finish', () => {
      const durationMs = Number(process.hrtime.bigint() - start) / 1_000_000;
      logger.debug('http_request', {
        method: req.method,
        path: req.originalUrl,
        status: res.statusCode,
        duration_ms: Number(durationMs.toFixed(1)),
        error_code: typeof res.locals.bucketErrorCode === 'string' ? res.locals.bucketErrorCode : null,
      });
    });
    next();
  });

  function sendCaptionResult(res: express.Response, result: CaptionResult): void {
    if (result.ok) {
      logger.info('captions_request_succeeded', {
        video_id: result.response.video_id,
        chars: result.response.captions.length,
      });
      res.json(result.response);
      return;
    }
    const { error } = result;
    res.locals.bucketErrorCode = error.error_code;
    const log = error.status >= 500 ? logger.error : logger.warn;
    log('captions_request_failed', {
      video_id: error.video_id,
      error_code: error.error_code,
      status: error.status,
      detail: error.message,
    });
    res.status(error.status).json(toErrorBody(error));
  }

  async function runCaptionPipeline(rawVideoId: string): Promise<CaptionResult> {
    logger.info('captions_request_received', { raw_video_id: rawVideoId });
    const normalized = normalizeVideoId(rawVideoId);
    if (!normalized.ok) {
      return { ok: false, error: makeCaptionError(normalized.errorCode, normalized.message, rawVideoId) };
    }
    return fetchCaptions(normalized.sourceNativeId, fetcher);
  }

  app.get('/', (_req, res) => {
    res.json({
      status: 'healthy',
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      endpoints: {
        get_captions: '/get-captions',
        captions_by_path: '/video/{video_id}/captions',
        health: '/health',
      },
    });
  });

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', service: SERVICE_SLUG, version: SERVICE_VERSION });
  });

  app.post('/get-captions', asyncRoute(async (req, res) => {
    const parsed = VideoRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      sendCaptionResult(res, {
        ok: false,
        error: makeCaptionError('VALIDATION_ERROR', 'Invalid request payload: video_id must be a string.', rawVideoIdFromBody(req.body)),
      });
      return;
    }
    sendCaptionResult(res, await runCaptionPipeline(parsed.data.video_id));
  }));

  app.get('/video/:videoId/captions', asyncRoute(async (req, res) => {
    sendCaptionResult(res, await runCaptionPipeline(req.params.videoId));
  }));

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found', error_code: 'NOT_FOUND' });
  });

  app.use((error: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    // body-parser tags client errors (malformed JSON, oversized body) with a 4xx status
    const status = typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number'
      ? error.status
      : 500;
    if (status >= 400 && status < 500) {
      sendCaptionResult(res, {
        ok: false,
        error: makeCaptionError('VALIDATION_ERROR', 'Invalid request payload.', null),
      });
      return;
    }
    const message = error instanceof Error ? error.message : 'Unknown error';
    sendCaptionResult(res, {
      ok: false,
      error: makeCaptionError('PROCESSING_ERROR', `Error processing video: ${message}`, null),
    });
  });

  return app;
}
