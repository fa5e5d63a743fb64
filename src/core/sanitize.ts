// CSI: ESC [ params intermediates final, or the single-byte 0x9B introducer.
const CSI_RE = /(?:\x1B\[|\x9B)[0-?]*[ -/]*[@-~]/g;
// OSC: ESC ] ... terminated by BEL or ST (ESC \).
const OSC_RE = /\x1B\][^\x07\x1B]*(?:\x07|\x1B\\)/g;
// Charset designation (ESC ( B) and the other two-byte escapes.
const ESC_RE = /\x1B(?:[()*+][0-9A-Za-z]|[@-Z\\-_=>78])/g;
// C0 controls except TAB and LF, DEL, C1 controls.
const CTRL_RE = /[\x00-\x08\x0B-\x1F\x7F-\x9F]/g;

/**
 * Strip terminal color/cursor sequences and control characters from one
 * line of captured output, then trim it. Applying it twice is a no-op.
 */
export function sanitizeLine(s: string): string {
  if (!s) return s;
  return s
    .replace(OSC_RE, '')
    .replace(CSI_RE, '')
    .replace(ESC_RE, '')
    .replace(CTRL_RE, '')
    .trim();
}
