import { ProtocolDecodeError } from './errors.js';

// Sticky: matched at the cursor, never searched for further along.
const LENGTH_HEADER_RE = /([0-9]+)\n/uy;
const LEADING_DIGITS_RE = /^[0-9]*$/u;
const MAX_HEADER_DIGITS = 15;

/**
 * Splits the backward channel's byte stream into chunks.
 *
 * The stream is a sequence of `<length>\n<payload>` frames. The declared length counts UTF-16
 * code units (what JavaScript's `String#length` reports on the server), not bytes, so the
 * buffer is kept as raw bytes and its complete UTF-8 prefix is decoded once per read. A
 * multi-byte character split across reads stays buffered until its remaining bytes arrive.
 */
export class ChunkParser {
  private buf: Buffer = Buffer.alloc(0);

  public get pendingBytes(): number {
    return this.buf.length;
  }

  /**
   * Appends `data` and returns the chunks that are now complete. The bytes are buffered
   * immediately; the returned generator only decodes.
   *
   * @throws ProtocolDecodeError (while iterating) on invalid UTF-8 or a header that is not a
   * decimal length.
   */
  public getChunks(data: Uint8Array): Generator<string, void, void> {
    if (data.length > 0) this.buf = Buffer.concat([this.buf, data]);
    return this.drain();
  }

  public reset(): void {
    this.buf = Buffer.alloc(0);
  }

  private *drain(): Generator<string, void, void> {
    if (this.buf.length === 0) return;

    let text: string;
    try {
      // A fresh streaming decoder holds back an incomplete trailing sequence; `fatal` rejects
      // bytes that can never become UTF-8 instead of substituting U+FFFD.
      text = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(this.buf, {
        stream: true,
      });
    } catch (err) {
      throw new ProtocolDecodeError('Backward channel is not valid UTF-8', { cause: err });
    }

    let pos = 0;
    while (pos < text.length) {
      LENGTH_HEADER_RE.lastIndex = pos;
      const match = LENGTH_HEADER_RE.exec(text);
      if (!match) {
        const head = text.slice(pos, pos + MAX_HEADER_DIGITS + 1);
        if (LEADING_DIGITS_RE.test(head) && head.length <= MAX_HEADER_DIGITS) return;
        throw new ProtocolDecodeError(`Invalid chunk length header: ${JSON.stringify(head)}`);
      }

      const header = match[0];
      const lengthStr = match[1] ?? '';
      if (lengthStr.length > MAX_HEADER_DIGITS) {
        throw new ProtocolDecodeError(`Chunk length header too long: ${lengthStr.length} digits`);
      }
      const length = Number.parseInt(lengthStr, 10);

      const start = pos + header.length;
      if (text.length - start < length) return;

      const payload = text.slice(start, start + length);
      const last = payload.charCodeAt(payload.length - 1);
      if (last >= 0xd800 && last <= 0xdbff) {
        throw new ProtocolDecodeError('Chunk length splits a surrogate pair');
      }

      pos = start + length;
      // The header is ASCII, so its code-unit count equals its byte count.
      this.buf = this.buf.subarray(header.length + Buffer.byteLength(payload, 'utf8'));
      yield payload;
    }
  }
}

/** Frames a payload the way the server does. */
export const encodeChunk = (payload: string): string => `${payload.length}\n${payload}`;
