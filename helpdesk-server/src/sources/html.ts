const STRIPPED_ELEMENTS = ["script", "style", "noscript", "header", "footer", "template"];

const NAMED_ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  nbsp: " ",
};

// Out-of-range references are left as written.
const fromCodePoint = (codePoint: number, match: string) =>
  Number.isInteger(codePoint) && codePoint >= 0 && codePoint <= 0x10ffff
    ? String.fromCodePoint(codePoint)
    : match;

export const decodeEntities = (text: string) =>
  text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
    if (entity.startsWith("#x") || entity.startsWith("#X")) {
      return fromCodePoint(parseInt(entity.slice(2), 16), match);
    }
    if (entity.startsWith("#")) {
      return fromCodePoint(parseInt(entity.slice(1), 10), match);
    }
    return NAMED_ENTITIES[entity.toLowerCase()] ?? match;
  });

export const extractTitle = (html: string): string | null => {
  const match = /<title[^>]*>([\s\S]*?)<\/title>/i.exec(html);
  const title = match ? decodeEntities(match[1]).replace(/\s+/g, " ").trim() : "";
  return title || null;
};

/** Visible text of an HTML page, whitespace collapsed. */
export const extractText = (html: string): string => {
  let body = html.replace(/<!--[\s\S]*?-->/g, " ");
  for (const tag of STRIPPED_ELEMENTS) {
    body = body.replace(
      new RegExp(`<${tag}\\b[^>]*>[\\s\\S]*?<\\/${tag}>`, "gi"),
      " "
    );
  }
  body = body.replace(/<title[^>]*>[\s\S]*?<\/title>/gi, " ");
  body = body.replace(/<[^>]+>/g, " ");
  return decodeEntities(body).replace(/\s+/g, " ").trim();
};

export const extractLinks = (html: string): string[] => {
  const links: string[] = [];
  const pattern = /<a\b[^>]*?\bhref\s*=\s*("([^"]*)"|'([^']*)'|([^\s>]+))/gi;
  for (const match of html.matchAll(pattern)) {
    const href = match[2] ?? match[3] ?? match[4];
    if (href) {
      links.push(decodeEntities(href.trim()));
    }
  }
  return links;
};
