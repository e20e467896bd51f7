// src/core/values/text.ts
// Grapheme-cluster view of strings

const segmenter = new Intl.Segmenter(undefined, { granularity: "grapheme" });

/** Split a string into user-perceived characters. */
export function graphemes(s: string): string[] {
  const out: string[] = [];
  for (const seg of segmenter.segment(s)) {
    out.push(seg.segment);
  }
  return out;
}

export function graphemeLength(s: string): number {
  // ASCII fast path: one code unit per grapheme except CR LF pairs
  if (/^[\x00-\x7f]*$/.test(s) && !s.includes("\r\n")) return s.length;
  return graphemes(s).length;
}
