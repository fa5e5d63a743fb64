import { sanitizeLine } from './sanitize.js';

export const MAX_LINE_LENGTH = 64 * 1024;

const REPLACEMENT_CHAR = '\uFFFD';
const TERMINATOR_RE = /\r\n|\r|\n/;

export interface SplitLine {
  text: string;
  lossy: boolean;
}

/**
 * Turns a byte stream into sanitized text lines.
 *
 * Bytes are decoded as UTF-8 in streaming mode, so a multi-byte character
 * split across chunks survives. Invalid sequences become U+FFFD and the
 * line is flagged lossy instead of failing. A trailing partial line stays
 * buffered until the next terminator or `flush()`.
 */
export class LineSplitter {
  private readonly decoder = new TextDecoder('utf-8', { fatal: false });
  private buffer = '';

  push(chunk: Uint8Array | string): SplitLine[] {
    this.buffer += typeof chunk === 'string' ? chunk : this.decoder.decode(chunk, { stream: true });
    return this.drain(false);
  }

  flush(): SplitLine[] {
    this.buffer += this.decoder.decode();
    return this.drain(true);
  }

  private drain(final: boolean): SplitLine[] {
    const parts = this.buffer.split(TERMINATOR_RE);
    // a lone trailing \r may be the first half of \r\n; keep it for the next chunk
    let rest = parts.pop() ?? '';
    if (!final && this.buffer.endsWith('\r')) {
      rest = '\r';
    }

    const out: SplitLine[] = [];
    for (const raw of parts) emit(raw, out);

    while (rest.length > MAX_LINE_LENGTH) {
      const cut = isHighSurrogate(rest.charCodeAt(MAX_LINE_LENGTH - 1)) ? MAX_LINE_LENGTH - 1 : MAX_LINE_LENGTH;
      emit(rest.slice(0, cut), out);
      rest = rest.slice(cut);
    }

    if (final) {
      emit(rest, out);
      rest = '';
    }
    this.buffer = rest;
    return out;
  }
}

// never cut between the halves of a surrogate pair
function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function emit(raw: string, out: SplitLine[]) {
  const text = sanitizeLine(raw);
  if (!text) return;
  out.push({ text, lossy: text.includes(REPLACEMENT_CHAR) });
}
