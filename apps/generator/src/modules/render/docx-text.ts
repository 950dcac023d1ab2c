interface TextNode {
  text: string;
}

export interface MarkerMatch {
  start: number;
  end: number;
  key: string;
}

/** `{{ key }}`, with optional spaces inside the braces */
const MARKER_PATTERN = /\{\{\s*([^{}]+?)\s*\}\}/g;

/** `<w:t>` runs only; `<w:tab/>`, `<w:tbl>` and self-closing `<w:t/>`, `<w:t xml:space="preserve"/>` do not match */
const TEXT_RUN_PATTERN = /(<w:t(?:\s[^>]*[^/>])?>)([\s\S]*?)(<\/w:t>)/g;

/** Word parts that may carry markers */
export const MARKER_PART_PATTERN = /^word\/(document|header\d*|footer\d*|footnotes|endnotes)\.xml$/;

/**
 * Replace every marker in a WordprocessingML part.
 * Word splits typed text across runs freely, so markers are found in the
 * concatenated text of all runs and replaced range by range.
 */
export function fillMarkers(
  xml: string,
  resolve: (key: string) => string,
): { xml: string; replaced: number } {
  const nodes = extractTextNodes(xml);
  if (nodes.length === 0) return { xml, replaced: 0 };

  const fullText = nodes.map((n) => n.text).join('');
  const matches = findMarkers(fullText);
  if (matches.length === 0) return { xml, replaced: 0 };

  // Right to left so earlier offsets stay valid
  for (const match of [...matches].reverse()) {
    replaceRangeInTextNodes(nodes, match.start, match.end, resolve(match.key));
  }

  let nodeIndex = 0;
  const updated = xml.replace(TEXT_RUN_PATTERN, (whole, openTag: string, _text: string, closeTag: string) => {
    const node = nodes[nodeIndex];
    nodeIndex += 1;
    if (!node) return whole;
    return `${preserveSpaceTag(openTag, node.text)}${encodeXmlText(node.text)}${closeTag}`;
  });

  return { xml: updated, replaced: matches.length };
}

export function findMarkers(text: string): MarkerMatch[] {
  const matches: MarkerMatch[] = [];
  for (const m of text.matchAll(MARKER_PATTERN)) {
    const index = m.index ?? 0;
    matches.push({ start: index, end: index + m[0].length, key: (m[1] ?? '').trim() });
  }
  return matches;
}

function extractTextNodes(xml: string): TextNode[] {
  const nodes: TextNode[] = [];
  for (const m of xml.matchAll(TEXT_RUN_PATTERN)) {
    nodes.push({ text: decodeXmlEntities(m[2] ?? '') });
  }
  return nodes;
}

/**
 * Put `replacement` where [start, end) of the joined node text was.
 * The first touched node takes the replacement; the others lose their share.
 */
function replaceRangeInTextNodes(nodes: TextNode[], start: number, end: number, replacement: string): void {
  if (end <= start) return;

  let cumulative = 0;
  let firstIndex = -1;
  let lastIndex = -1;
  let firstOffset = 0;
  let lastOffset = 0;

  for (const [i, node] of nodes.entries()) {
    const nodeStart = cumulative;
    const nodeEnd = nodeStart + node.text.length;

    if (firstIndex === -1 && start < nodeEnd && end > nodeStart) {
      firstIndex = i;
      firstOffset = Math.max(0, start - nodeStart);
    }
    if (firstIndex !== -1 && end <= nodeEnd) {
      lastIndex = i;
      lastOffset = Math.max(0, end - nodeStart);
      break;
    }

    cumulative = nodeEnd;
  }

  const firstNode = nodes[firstIndex];
  const lastNode = nodes[lastIndex];
  if (!firstNode || !lastNode) return;

  if (firstNode === lastNode) {
    firstNode.text = firstNode.text.slice(0, firstOffset) + replacement + firstNode.text.slice(lastOffset);
    return;
  }

  firstNode.text = `${firstNode.text.slice(0, firstOffset)}${replacement}`;
  lastNode.text = lastNode.text.slice(lastOffset);
  for (const middle of nodes.slice(firstIndex + 1, lastIndex)) {
    middle.text = '';
  }
}

/** Word drops leading/trailing spaces of a run unless told to keep them */
function preserveSpaceTag(openTag: string, text: string): string {
  if (openTag.includes('xml:space') || !/^\s|\s$/.test(text)) return openTag;
  return openTag.replace(/^<w:t/, '<w:t xml:space="preserve"');
}

function decodeXmlEntities(text: string): string {
  return text
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&#x([0-9a-fA-F]+);/g, (_match: string, hex: string) => {
      const code = Number.parseInt(hex, 16);
      return Number.isFinite(code) ? String.fromCodePoint(code) : '';
    })
    .replace(/&#([0-9]+);/g, (_match: string, dec: string) => {
      const code = Number.parseInt(dec, 10);
      return Number.isFinite(code) ? String.fromCodePoint(code) : '';
    })
    .replace(/&amp;/g, '&');
}

function encodeXmlText(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}
