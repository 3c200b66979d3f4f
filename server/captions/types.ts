export type CaptionErrorCode =
  | 'VALIDATION_ERROR'
  | 'NO_TRANSCRIPT_AVAILABLE'
  | 'VIDEO_NOT_FOUND'
  | 'VIDEO_PRIVATE'
  | 'CAPTIONS_DISABLED'
  | 'PROCESSING_ERROR';

export type CaptionResponse = {
  video_id: string;
  captions: string;
  language: string;
  total_duration: number;
};

export type ClassifiedError = {
  error_code: CaptionErrorCode;
  message: string;
  status: number;
  /** Raw input when normalization failed, the normalized id otherwise. */
  video_id: string | null;
};

export type CaptionResult =
  | { ok: true; response: CaptionResponse }
  | { ok: false; error: ClassifiedError };

export type CaptionErrorBody = {
  error: string;
  error_code: CaptionErrorCode;
  video_id: string | null;
};

export const DEFAULT_LANGUAGE = 'en';

export const CAPTION_ERROR_STATUS: Record<CaptionErrorCode, number> = {
  VALIDATION_ERROR: 400,
  NO_TRANSCRIPT_AVAILABLE: 404,
  VIDEO_NOT_FOUND: 404,
  VIDEO_PRIVATE: 403,
  CAPTIONS_DISABLED: 400,
  PROCESSING_ERROR: 500,
};

export function makeCaptionError(errorCode: CaptionErrorCode, message: string, videoId: string | null): ClassifiedError {
  return {
    error_code: errorCode,
    message,
    status: CAPTION_ERROR_STATUS[errorCode],
    video_id: videoId,
  };
}

export function toErrorBody(error: ClassifiedError): CaptionErrorBody {
  return {
    error: error.message,
    error_code: error.error_code,
    video_id: error.video_id,
  };
}
