const FENCE_OPEN = /^ {0,3}(`{3,}|~{3,})(.*)$/;

export type OpenFence = {
  marker: string;
  line: number;
};

export type LineVisitor = (text: string, line: number) => void;

/**
 * Walk markdown lines, calling `visit` only for lines outside fenced code blocks.
 * Fence delimiters themselves are never visited. Returns the fence left open at
 * the end of the input, if any.
 */
export function walkProse(body: string, firstLine: number, visit: LineVisitor): OpenFence | null {
  const lines = body.split("\n");
  let open: OpenFence | null = null;

  for (const [index, text] of lines.entries()) {
    const line = firstLine + index;

    if (open) {
      if (closesFence(text, open.marker)) open = null;
      continue;
    }

    const match = FENCE_OPEN.exec(text);
    const marker = match?.[1];
    // backtick fences may not carry backticks in their info string
    if (marker && !(marker.startsWith("`") && match?.[2]?.includes("`"))) {
      open = { marker, line };
      continue;
    }

    visit(text, line);
  }

  return open;
}

function closesFence(text: string, marker: string): boolean {
  const trimmed = text.trim();
  if (text.length - text.trimStart().length > 3) return false;
  const char = marker.charAt(0);
  if (trimmed.length < marker.length) return false;
  return [...trimmed].every((c) => c === char);
}
