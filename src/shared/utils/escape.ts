/**
 * Markup escaping for the HTML and XML error renderers.
 */
const MARKUP_ENTITIES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#039;',
};

const MARKUP_ENTITIES_REGEX = /[&<>"']/g;

export function escapeHtml(unsafe: string | number | null | undefined): string {
  if (unsafe === null || unsafe === undefined) {
    return '';
  }

  return String(unsafe).replace(MARKUP_ENTITIES_REGEX, (char) => MARKUP_ENTITIES[char] ?? char);
}

/** XML 1.0 has the same five predefined entities, so the escaping is shared. */
export const escapeXml = escapeHtml;
