// ═══════════════════════════════════════════════════════════════════════════════
// LIST SECTIONS — Bullet Splitting with Continuation Lines
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Item markers: -, *, •, – or a number followed by `.` or `)`.
 * `**` is emphasis, not a bullet.
 */
const ITEM_MARKER = /^\s*(?:[-•–]|\*(?!\*)|\d{1,3}[.)](?=\s))\s*/;

const PLACEHOLDERS = new Set([
  'none',
  'n/a',
  'na',
  'none identified',
  'none found',
  'none noted',
  'not applicable',
  'nothing',
]);

export function isListMarker(line: string): boolean {
  return ITEM_MARKER.test(line);
}

export function stripListMarker(line: string): string {
  return line.replace(ITEM_MARKER, '').trim();
}

function isPlaceholder(item: string): boolean {
  return PLACEHOLDERS.has(item.toLowerCase().replace(/[.!]+$/, '').trim());
}

/**
 * Split section body lines into items. A marker line opens an item; any
 * other non-blank line continues the open item, joined by one space. Lines
 * before the first marker open an item of their own.
 */
export function splitListItems(lines: readonly string[]): string[] {
  const items: string[] = [];
  let open: string | null = null;

  for (const raw of lines) {
    if (!raw.trim()) {
      continue;
    }

    if (isListMarker(raw)) {
      if (open !== null) {
        items.push(open);
      }
      open = stripListMarker(raw);
    } else {
      open = open === null ? raw.trim() : `${open} ${raw.trim()}`.trim();
    }
  }

  if (open !== null) {
    items.push(open);
  }

  return items.filter((item) => item.length > 0 && !isPlaceholder(item));
}
