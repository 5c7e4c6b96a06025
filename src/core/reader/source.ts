// src/core/reader/source.ts
// Source buffers, byte spans and line/column lookup

export type SourceBuffer = Uint8Array;
export type SourceInput = string | Uint8Array;

/** Half-open byte range `[start, end)` into a source buffer. */
export interface ByteSpan {
  readonly start: number;
  readonly end: number;
}

/** A byte span resolved to a human position (1-based line and column). */
export interface Span extends ByteSpan {
  file?: string;
  startLine: number;
  startCol: number;
}

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export function toSourceBuffer(src: SourceInput): SourceBuffer {
  return typeof src === "string" ? encoder.encode(src) : src;
}

export function decodeBytes(bytes: Uint8Array): string {
  return decoder.decode(bytes);
}

const NEWLINE = 0x0a;

// UTF-8 continuation bytes look like 10xxxxxx
const isContinuation = (b: number) => (b & 0xc0) === 0x80;

/**
 * Resolve a byte span to line/column. Columns count code points, not bytes,
 * so `花` advances the column by one.
 */
export function locate(buffer: SourceBuffer, span: ByteSpan, file?: string): Span {
  const limit = Math.min(span.start, buffer.length);
  let line = 1;
  let col = 1;
  for (let i = 0; i < limit; i++) {
    const b = buffer[i];
    if (b === NEWLINE) {
      line++;
      col = 1;
    } else if (b !== undefined && !isContinuation(b)) {
      col++;
    }
  }
  const out: Span = { start: span.start, end: span.end, startLine: line, startCol: col };
  if (file !== undefined) out.file = file;
  return out;
}
