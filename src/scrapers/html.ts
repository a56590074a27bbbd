/**
 * Regex-level HTML helpers. The job sites are WordPress posts with flat
 * markup, so no DOM is built.
 */

export interface TagMatch {
  tag: string;
  attrs: string;
  inner: string;
  /** offset of the opening tag */
  start: number;
  /** offset just past the closing tag */
  end: number;
}

export function decodeEntities(s: string): string {
  return s
    .replace(/&nbsp;/g, ' ')
    .replace(/&#8211;|&ndash;/g, '–')
    .replace(/&#8217;|&rsquo;/g, '’')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#0?39;/g, "'")
    .replace(/&amp;/g, '&');
}

/**
 * Tags removed, entities decoded, whitespace collapsed
 */
export function textOf(html: string): string {
  return decodeEntities(
    html
      .replace(/<script[\s\S]*?<\/script>/gi, ' ')
      .replace(/<style[\s\S]*?<\/style>/gi, ' ')
      .replace(/<br\s*\/?>/gi, ' ')
      .replace(/<[^>]+>/g, ' ')
  )
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Non-nested elements of the given tag names, in document order
 */
export function findElements(html: string, tags: string[], from = 0): TagMatch[] {
  const names = tags.join('|');
  const re = new RegExp(`<(${names})\\b([^>]*)>([\\s\\S]*?)<\\/\\1\\s*>`, 'gi');
  re.lastIndex = from;

  const matches: TagMatch[] = [];
  let m: RegExpExecArray | null;
  while ((m = re.exec(html)) !== null) {
    matches.push({
      tag: m[1].toLowerCase(),
      attrs: m[2],
      inner: m[3],
      start: m.index,
      end: m.index + m[0].length,
    });
  }
  return matches;
}

export function findFirst(html: string, tags: string[], from = 0): TagMatch | undefined {
  return findElements(html, tags, from)[0];
}

export function attribute(attrs: string, name: string): string | undefined {
  const m = new RegExp(`\\b${name}\\s*=\\s*(?:"([^"]*)"|'([^']*)')`, 'i').exec(attrs);
  if (!m) return undefined;
  return decodeEntities(m[1] ?? m[2] ?? '');
}
