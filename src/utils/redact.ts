/**
 * Strip credentials from strings before they reach a log line or an error message.
 */
const PATTERNS: Array<[RegExp, string]> = [
  // Telegram API / file URLs embed the bot token
  [/\/bot\d+:[A-Za-z0-9_-]+/g, '/bot<redacted>'],
  [/\/file\/bot[^/\s]+/g, '/file/bot<redacted>'],
  [/Bearer\s+[A-Za-z0-9._~+/=-]+/gi, 'Bearer <redacted>'],
  [/((?:api[_-]?)?key=)[^&\s"']+/gi, '$1<redacted>'],
];

export function redactSecrets(value: string): string {
  let result = value;
  for (const [pattern, replacement] of PATTERNS) {
    result = result.replace(pattern, replacement);
  }
  return result;
}
