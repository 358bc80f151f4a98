/**
 * Checks if input is an object and not null.
 */
export const isARealObject = (value: unknown): value is Record<string, unknown> => {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
};

/**
 * Checks if input is a string or null.
 * Used for validating optional string fields in settings.
 */
export const isStringOrNull = (value: unknown): value is string | null => {
  return value === null || typeof value === 'string';
};

/**
 * Checks if input is a non-negative integer.
 */
export const isCount = (value: unknown): value is number => {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
};

/**
 * Returns true for absolute http(s) URLs.
 * Anything else (javascript:, data:, relative paths) is rejected.
 */
export function isHttpUrl(raw: string): boolean {
  try {
    const url = new URL(raw);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#x27;',
};

/**
 * Escapes text for use in HTML element content and quoted attributes.
 */
export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

/**
 * Truncates text to at most maxLength code points, ending with an ellipsis
 * when cut. Counting code points keeps surrogate pairs (emoji) whole.
 */
export function truncate(text: string, maxLength: number): string {
  const codePoints = Array.from(text);
  if (codePoints.length <= maxLength) return text;
  return `${codePoints.slice(0, maxLength - 3).join('')}…`;
}

/**
 * Escapes the pipe character so text stays inside one Markdown table cell.
 */
export function escapeMarkdownCell(text: string): string {
  return text.replace(/\|/g, '\\|');
}
