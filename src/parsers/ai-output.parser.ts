import { MalformedOutputError } from '../utils/errors.ts';

const CODE_FENCE = /```(?:json)?/gi;

/**
 * Pull the JSON object out of a chat completion: drops code fences and any
 * prose around the outermost braces. Throws MalformedOutputError when no
 * parseable object remains.
 */
export function extractJsonPayload(output: string): string {
  const cleaned = output.replace(CODE_FENCE, '').trim();
  const start = cleaned.indexOf('{');
  const end = cleaned.lastIndexOf('}');

  if (start === -1 || end <= start) {
    throw new MalformedOutputError('No JSON object in AI output', output);
  }

  const candidate = cleaned.slice(start, end + 1);
  try {
    JSON.parse(candidate);
  } catch (error) {
    throw new MalformedOutputError('AI output is not valid JSON', output, { cause: error });
  }

  return candidate;
}

/**
 * Parse text already returned by extractJsonPayload (or any caller-supplied JSON).
 */
export function parseJsonOutput(output: string): unknown {
  try {
    return JSON.parse(output);
  } catch (error) {
    throw new MalformedOutputError('AI output is not valid JSON', output, { cause: error });
  }
}
