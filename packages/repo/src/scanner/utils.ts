import * as path from 'path';

export const DEFAULT_IGNORES = ['.git'];

export function matchesExtension(fileName: string, extensions: ReadonlySet<string>): boolean {
  return extensions.has(path.extname(fileName).toLowerCase());
}

export type DecodedContent =
  | { kind: 'text'; text: string }
  | { kind: 'binary' }
  | { kind: 'invalid-utf8' };

const strictDecoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });
const lenientDecoder = new TextDecoder('utf-8', { ignoreBOM: true });

/**
 * Classifies file bytes for extraction: a NUL byte marks binary content,
 * and the remainder must be well-formed UTF-8.
 */
export function decodeStrict(bytes: Uint8Array): DecodedContent {
  if (bytes.includes(0)) {
    return { kind: 'binary' };
  }
  try {
    return { kind: 'text', text: strictDecoder.decode(bytes) };
  } catch {
    return { kind: 'invalid-utf8' };
  }
}

/** Decodes with malformed sequences replaced by U+FFFD. */
export function decodeLenient(bytes: Uint8Array): string {
  return lenientDecoder.decode(bytes);
}
