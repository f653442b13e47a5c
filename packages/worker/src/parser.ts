// =============================================================================
// @feedsieve/worker: Feed document parser
// =============================================================================
// Wraps rss-parser, which reads RSS 0.9x/1.0/2.0 and Atom. Dates that do not
// parse become null and the fetcher decides the fallback. The feed type comes
// from the document's root element.
// =============================================================================

import Parser from "rss-parser";
import { ParseError, errorMessage } from "@feedsieve/shared";

export interface ParsedItem {
  title: string;
  link: string;
  content: string;
  guid: string;
  publishedAt: Date | null;
  updatedAt: Date | null;
}

export type FeedType = "rss" | "atom";

export interface ParsedFeed {
  title: string;
  description: string;
  /** Site link, used to resolve the favicon */
  link: string;
  feedType: FeedType;
  /** lastBuildDate (RSS) or updated (Atom) */
  updatedAt: Date | null;
  items: ParsedItem[];
}

export interface FeedParser {
  /** @throws ParseError when `body` is not a readable feed document. */
  parse(body: string): Promise<ParsedFeed>;
}

type ExtraFields = Record<string, unknown>;

function toDate(value: unknown): Date | null {
  if (typeof value !== "string" || value.trim() === "") return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

/** First element name after any prolog, comments and doctype. */
function rootElement(body: string): string {
  return /<(?![?!])([A-Za-z_][\w:.-]*)/.exec(body)?.[1] ?? "";
}

function text(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

export class RssFeedParser implements FeedParser {
  private readonly parser = new Parser<ExtraFields, ExtraFields>({
    customFields: { item: ["updated"] },
  });

  async parse(body: string): Promise<ParsedFeed> {
    const output = await this.parser.parseString(body).catch((err: unknown) => {
      throw new ParseError(`error parsing feed: ${errorMessage(err)}`, {
        cause: err,
      });
    });

    return {
      title: text(output.title),
      description: text(output.description),
      link: text(output.link),
      feedType: rootElement(body) === "feed" ? "atom" : "rss",
      updatedAt: toDate(output.lastBuildDate),
      items: output.items.map((item) => ({
        title: text(item.title),
        link: text(item.link),
        content: text(item.content) || text(item.summary),
        guid: text(item.guid) || text(item.id),
        publishedAt: toDate(item.isoDate) ?? toDate(item.pubDate),
        updatedAt: toDate(item.updated),
      })),
    };
  }
}
