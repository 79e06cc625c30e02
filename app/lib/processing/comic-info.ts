/**
 * ComicInfo.xml pass-through checks. The file is copied verbatim when it is
 * well-formed; nothing here edits metadata.
 */

export const COMIC_INFO_ENTRY = "ComicInfo.xml";

const IGNORED_MARKUP = /<!--[\s\S]*?-->|<!\[CDATA\[[\s\S]*?\]\]>|<\?[\s\S]*?\?>|<!DOCTYPE[^>]*>/g;
const TAG = /<(\/?)([A-Za-z_][\w.:-]*)((?:\s+[^>]*?)?)(\/?)>/g;

/**
 * Check that the text is a single well-formed element tree rooted at <ComicInfo>.
 */
export function isWellFormedComicInfo(xml: string): boolean {
  const body = xml.replace(/^\uFEFF/, "").replace(IGNORED_MARKUP, "").trim();
  if (!body.startsWith("<") || !body.endsWith(">")) return false;

  const stack: string[] = [];
  let roots = 0;
  let cursor = 0;

  for (const match of body.matchAll(TAG)) {
    const index = match.index ?? 0;
    const between = body.slice(cursor, index);
    if (between.includes("<")) return false;
    if (stack.length === 0 && between.trim().length > 0) return false;
    cursor = index + match[0].length;

    const [, closing, name, , selfClosing] = match;
    if (closing) {
      if (stack.pop() !== name) return false;
      continue;
    }
    if (stack.length === 0) {
      roots++;
      if (roots > 1 || name !== "ComicInfo") return false;
    }
    if (!selfClosing) stack.push(name);
  }

  const trailing = body.slice(cursor);
  return roots === 1 && stack.length === 0 && trailing.trim().length === 0;
}
