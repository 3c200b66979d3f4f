import { makeCaptionError, type ClassifiedError } from './types';

export const NO_TRANSCRIPT_MESSAGE = 'No captions/transcripts available for this video';

type ClassificationRule = {
  needles: string[];
  errorCode: 'VIDEO_NOT_FOUND' | 'VIDEO_PRIVATE' | 'CAPTIONS_DISABLED';
  message: string;
};

// Checked in order; the first rule with a matching needle wins.
const RULES: ClassificationRule[] = [
  {
    needles: ['video unavailable', 'video does not exist', 'does not exist'],
    errorCode: 'VIDEO_NOT_FOUND',
    message: 'Video not found or is unavailable',
  },
  {
    needles: ['private'],
    errorCode: 'VIDEO_PRIVATE',
    message: 'Video is private and captions cannot be accessed',
  },
  {
    needles: ['disabled', 'not available'],
    errorCode: 'CAPTIONS_DISABLED',
    message: 'Captions are disabled for this video',
  },
];

/**
 * Maps an upstream failure message to a caption error. Matching is a
 * case-insensitive substring test against the rules above; anything else is a
 * PROCESSING_ERROR that carries the original message.
 */
export function classifyCaptionFailure(message: string, videoId: string | null): ClassifiedError {
  const normalized = message.toLowerCase();
  const rule = RULES.find((candidate) => candidate.needles.some((needle) => normalized.includes(needle)));
  if (rule) {
    return makeCaptionError(rule.errorCode, rule.message, videoId);
  }
  return makeCaptionError('PROCESSING_ERROR', `Error processing video: ${message}`, videoId);
}
