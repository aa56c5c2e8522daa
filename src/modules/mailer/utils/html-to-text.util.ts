const SKIPPED_BLOCKS = [
  'style',
  'script',
  'iframe',
  'applet',
  'object',
  'svg',
  'button',
  'form',
  'textarea',
  'select',
  'template',
];

const SKIPPED_TAGS = ['img', 'input', 'option'];

const INLINE_TAGS = [
  'a',
  'span',
  'small',
  'strike',
  'strong',
  'sub',
  'sup',
  'em',
  'b',
  'u',
  'i',
];

// NUL never survives decoding, so it can mark <br> positions
const LINE_BREAK = '\u0000';
const REPLACEMENT_CHAR = '\uFFFD';
const MAX_CODE_POINT = 0x10ffff;

const NAMED_ENTITIES: Record<string, string> = {
  nbsp: ' ',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
};

function fromCodePoint(codePoint: number): string {
  const isSurrogate = codePoint >= 0xd800 && codePoint <= 0xdfff;
  if (codePoint === 0 || codePoint > MAX_CODE_POINT || isSurrogate) {
    return REPLACEMENT_CHAR;
  }
  return String.fromCodePoint(codePoint);
}

function decodeEntities(text: string): string {
  return text
    .replace(/&#x([0-9a-f]+);/gi, (_match, hex: string) =>
      fromCodePoint(parseInt(hex, 16)),
    )
    .replace(/&#(\d+);/g, (_match, dec: string) =>
      fromCodePoint(parseInt(dec, 10)),
    )
    .replace(/&(nbsp|lt|gt|quot|apos);/gi, (match, name: string) => {
      return NAMED_ENTITIES[name.toLowerCase()] ?? match;
    })
    .replace(/&amp;/gi, '&');
}

function formatLink(attributes: string, label: string): string {
  const href = /href\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s>]+))/i.exec(
    attributes,
  );
  const url = href ? (href[1] ?? href[2] ?? href[3] ?? '') : '';
  const text = label.replace(/<[^>]+>/g, '').trim() || 'LINK';

  return url ? `[${text}](${url})` : `[${text}]`;
}

/**
 * Basic HTML to plain text conversion for the text part of a message.
 *
 * Links become `[label](href)`, list items are prefixed with `- `, block
 * elements start a new line and every `<br>` adds one. Indentation and empty
 * lines are dropped. Invalid character references become U+FFFD. The markup
 * is not validated.
 */
export function htmlToText(html: string): string {
  let text = html
    .replace(/\u0000/g, REPLACEMENT_CHAR)
    .replace(/<!--[\s\S]*?-->/g, '');

  for (const tag of SKIPPED_BLOCKS) {
    text = text.replace(
      new RegExp(`<${tag}\\b[^>]*>[\\s\\S]*?<\\/${tag}\\s*>`, 'gi'),
      '',
    );
  }
  text = text.replace(
    new RegExp(`<(?:${SKIPPED_TAGS.join('|')})\\b[^>]*>`, 'gi'),
    '',
  );

  text = text
    .replace(/\s+/g, ' ')
    .replace(
      /<a\b([^>]*)>([\s\S]*?)<\/a\s*>/gi,
      (_match, attrs: string, label: string) => formatLink(attrs, label),
    )
    .replace(/<br\s*\/?>/gi, LINE_BREAK)
    .replace(/<li\b[^>]*>/gi, '\n- ')
    .replace(/<\/?([a-z][a-z0-9]*)\b[^>]*>/gi, (_match, tag: string) =>
      INLINE_TAGS.includes(tag.toLowerCase()) ? '' : '\n',
    );

  text = decodeEntities(text)
    .split('\n')
    .map((line) => line.replace(/ {2,}/g, ' ').trim())
    .filter((line) => line !== '')
    .join('\n');

  return text
    .split(LINE_BREAK)
    .map((segment) => segment.replace(/^ +| +$/g, ''))
    .join('\n')
    .trim();
}
