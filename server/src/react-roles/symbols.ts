const CUSTOM_EMOTE_REGEX = /^<a?:[a-zA-Z0-9_]{2,32}:(\d{1,20})>$/;

/**
 * Normalize a reaction symbol to the form it is stored under.
 * Custom emotes (`<:name:id>` or `<a:name:id>`) are stored by id, unicode as-is.
 */
export function normalizeSymbol(input: string): string {
  const trimmed = input.trim();
  const match = CUSTOM_EMOTE_REGEX.exec(trimmed);
  return match ? match[1] : trimmed;
}
