import { BadRequestError } from '../errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('JSON');

export type JsonObject = Record<string, unknown>;

const CODE_FENCE_PATTERN = /```(?:json)?\s*(\{[\s\S]*?\})\s*```/i;

export const UNINTERPRETABLE_RESPONSE_MESSAGE =
  'The AI service returned data in an unexpected format.\n\n' +
  'This is usually temporary. Please try your request again.\n' +
  'If the problem persists, try simplifying your request.';

/**
 * Extract the JSON object embedded in a model reply.
 *
 * Tries, in order: the whole text, the inside of a ``` fence (optionally
 * tagged json), then everything from the first `{` to the last `}`.
 * The raw reply is logged on failure but never put in the thrown error.
 */
export function extractJsonObject(text: string): JsonObject {
  const direct = tryParseObject(text);
  if (direct) return direct;

  const fenced = CODE_FENCE_PATTERN.exec(text);
  if (fenced) {
    const parsed = tryParseObject(fenced[1]);
    if (parsed) return parsed;
    log.debug('Code fence found but its contents did not parse');
  }

  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start !== -1 && end > start) {
    const parsed = tryParseObject(text.slice(start, end + 1));
    if (parsed) return parsed;
  }

  log.error('No JSON object could be recovered from model response', {
    length: text.length,
    response: text.slice(0, 500),
  });
  throw new BadRequestError(UNINTERPRETABLE_RESPONSE_MESSAGE);
}

function tryParseObject(candidate: string): JsonObject | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(candidate);
  } catch {
    return null;
  }
  return isJsonObject(parsed) ? parsed : null;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
