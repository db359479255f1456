import { XMLParser, XMLValidator } from "fast-xml-parser";

export type FeedEntry = {
  title: string;
  link: string;
  /** ISO-8601 形式的结构化时间（dc:date / Atom published / updated） */
  structuredDate?: string;
  /** RFC-822 形式的头部时间（RSS pubDate） */
  headerDate?: string;
  /** media:thumbnail / media:content 的第一个 url */
  thumbnail?: string;
};

export class FeedParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FeedParseError";
  }
}

type XmlNode = Record<string, unknown>;

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  textNodeName: "#text",
  parseTagValue: false,
  trimValues: true,
  // 标题里常见 &#322; 这类数字字符引用
  htmlEntities: true
});

function isNode(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asArray(value: unknown): unknown[] {
  if (value == null || value === "") return [];
  return Array.isArray(value) ? value : [value];
}

function child(node: unknown, key: string): unknown {
  return isNode(node) ? node[key] : undefined;
}

function textOf(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  if (Array.isArray(value)) return textOf(value[0]);
  if (!isNode(value)) return "";
  const text = value["#text"];
  return typeof text === "string" ? text : "";
}

function attrOf(node: unknown, name: string): string {
  const value = child(node, `@_${name}`);
  return typeof value === "string" ? value : "";
}

function pickAtomLink(linkNode: unknown): string {
  const links = asArray(linkNode);
  const alternate = links.find((l) => attrOf(l, "rel") === "alternate" || !attrOf(l, "rel"));
  const candidate = alternate ?? links[0];
  return attrOf(candidate, "href") || textOf(candidate);
}

function firstMediaUrl(item: unknown): string {
  for (const key of ["media:thumbnail", "media:content"]) {
    const first = asArray(child(item, key))[0];
    const url = attrOf(first, "url").trim();
    if (url) return url;
  }
  return "";
}

function optional(value: string): string | undefined {
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}

function toEntry(params: {
  title: string;
  link: string;
  structuredDate: string;
  headerDate: string;
  thumbnail: string;
}): FeedEntry {
  const entry: FeedEntry = { title: params.title.trim(), link: params.link.trim() };
  const structuredDate = optional(params.structuredDate);
  const headerDate = optional(params.headerDate);
  const thumbnail = optional(params.thumbnail);
  if (structuredDate) entry.structuredDate = structuredDate;
  if (headerDate) entry.headerDate = headerDate;
  if (thumbnail) entry.thumbnail = thumbnail;
  return entry;
}

/**
 * 按 XML 声明里的 encoding 解码（其次是 content-type 的 charset，最后 UTF-8）。
 */
export function decodeFeedBytes(bytes: Uint8Array, contentType?: string | null): string {
  const head = Buffer.from(bytes.subarray(0, 256)).toString("latin1");
  const declared = /^\s*<\?xml[^>]*\bencoding\s*=\s*["']([\w.:-]+)["']/i.exec(head)?.[1];
  const fromHeader = contentType ? /charset\s*=\s*"?([\w.:-]+)"?/i.exec(contentType)?.[1] : undefined;

  for (const label of [declared, fromHeader]) {
    if (!label) continue;
    try {
      return new TextDecoder(label).decode(bytes);
    } catch {
      // 未知编码名：继续尝试下一个
      continue;
    }
  }
  return new TextDecoder("utf-8").decode(bytes);
}

/** 按源顺序返回条目；XML 本身不合法时抛 FeedParseError。 */
export function parseFeed(xml: string): FeedEntry[] {
  const valid = XMLValidator.validate(xml);
  if (valid !== true) {
    throw new FeedParseError(`invalid xml: ${valid.err.msg} (line ${valid.err.line})`);
  }

  const root: unknown = parser.parse(xml);

  // RSS 2.0
  const channel = child(child(root, "rss"), "channel") ?? child(root, "channel");
  const rssItems = asArray(child(channel, "item"));
  if (rssItems.length > 0) {
    return rssItems.map((item) =>
      toEntry({
        title: textOf(child(item, "title")),
        link: textOf(child(item, "link")),
        structuredDate: textOf(child(item, "dc:date")),
        headerDate: textOf(child(item, "pubDate")),
        thumbnail: firstMediaUrl(item)
      })
    );
  }

  // Atom
  const atomEntries = asArray(child(child(root, "feed"), "entry"));
  if (atomEntries.length > 0) {
    return atomEntries.map((entry) =>
      toEntry({
        title: textOf(child(entry, "title")),
        link: pickAtomLink(child(entry, "link")),
        structuredDate: textOf(child(entry, "published")) || textOf(child(entry, "updated")),
        headerDate: "",
        thumbnail: firstMediaUrl(entry)
      })
    );
  }

  // RSS 1.0 (RDF)
  const rdfItems = asArray(child(child(root, "rdf:RDF") ?? child(root, "rdf"), "item"));
  return rdfItems.map((item) =>
    toEntry({
      title: textOf(child(item, "title")),
      link: textOf(child(item, "link")),
      structuredDate: textOf(child(item, "dc:date")),
      headerDate: "",
      thumbnail: firstMediaUrl(item)
    })
  );
}
