export const MAX_REPORT_TEXT = 500;

export function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max) : text;
}

const ESCAPES: Record<string, string> = {
  '<': '&lt;',
  '>': '&gt;',
  '&': '&amp;',
  '"': '&quot;',
  "'": '&apos;',
};

const ANSI_SEQUENCE = /\u001b\[[0-9;?]*[ -\/]*[@-~]/g;
// C0 controls other than tab, newline and carriage return are not allowed in XML 1.0.
const FORBIDDEN_CONTROL = /[\u0000-\u0008\u000b\u000c\u000e-\u001f]/g;

/** Drop terminal colour sequences and characters XML cannot carry. */
function stripControl(s: string): string {
  return s.replace(ANSI_SEQUENCE, '').replace(FORBIDDEN_CONTROL, '');
}

/** Escape text for XML/HTML content and attribute values. */
export function escapeMarkup(s: string): string {
  return stripControl(s).replace(/[<>&"']/g, (c) => ESCAPES[c] ?? c);
}
