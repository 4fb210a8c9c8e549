export const DEFAULT_MARKERS = {
  start: '<!-- CODEVITALS_START -->',
  end:   '<!-- CODEVITALS_END -->',
} as const;

export interface Markers {
  start: string;
  end: string;
}

export type InjectResult =
  | { status: 'updated' | 'unchanged'; content: string }
  | { status: 'missing-markers' | 'invalid-markers'; content: string };

/**
 * Replaces whatever sits between the first start marker and the first end
 * marker with `block`. The markers themselves and everything outside them
 * are preserved. The block always starts on its own line and ends with a
 * newline, so feeding the output back in reports `unchanged`.
 */
export function injectHealthBlock(content: string, block: string, markers: Markers = DEFAULT_MARKERS): InjectResult {
  const startIdx = content.indexOf(markers.start);
  const endIdx = content.indexOf(markers.end);

  if (startIdx === -1 || endIdx === -1) return { status: 'missing-markers', content };
  if (startIdx >= endIdx) return { status: 'invalid-markers', content };

  const before = content.slice(0, startIdx + markers.start.length);
  const after = content.slice(endIdx);
  const body = block.endsWith('\n') ? block : block + '\n';

  const updated = `${before}\n${body}${after}`;
  return { status: updated === content ? 'unchanged' : 'updated', content: updated };
}
