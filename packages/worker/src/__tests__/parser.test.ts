import { describe, it, expect } from "vitest";
import { RssFeedParser } from "../parser.js";

const ATOM = `<?xml version="1.0" encoding="utf-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title>Atom Example</title>
  <link href="https://atom.example.org/"/>
  <id>urn:example:feed</id>
  <updated>2024-03-02T08:00:00Z</updated>
  <entry>
    <title>Only updated</title>
    <link href="https://atom.example.org/posts/1"/>
    <id>urn:example:1</id>
    <updated>2024-03-01T08:00:00Z</updated>
    <summary>A short summary</summary>
  </entry>
</feed>`;

const RSS = `<?xml version="1.0"?>
<rss version="2.0">
  <channel>
    <title>  Padded Title  </title>
    <link>https://rss.example.org/</link>
    <description>Daily notes</description>
    <lastBuildDate>Thu, 07 Mar 2024 06:00:00 GMT</lastBuildDate>
    <item>
      <title>Dated</title>
      <link>https://rss.example.org/a</link>
      <guid>a-1</guid>
      <pubDate>Wed, 06 Mar 2024 09:30:00 GMT</pubDate>
      <description>Body</description>
    </item>
    <item>
      <title>Undated</title>
      <link>https://rss.example.org/b</link>
      <pubDate>not a date</pubDate>
    </item>
  </channel>
</rss>`;

describe("RssFeedParser", () => {
  const parser = new RssFeedParser();

  it("should read RSS channel and items", async () => {
    const feed = await parser.parse(RSS);

    expect(feed.title).toBe("Padded Title");
    expect(feed.link).toBe("https://rss.example.org/");
    expect(feed.items[0]).toEqual({
      title: "Dated",
      link: "https://rss.example.org/a",
      content: "Body",
      guid: "a-1",
      publishedAt: new Date("2024-03-06T09:30:00.000Z"),
      updatedAt: null,
    });
  });

  it("should leave an unparseable date null", async () => {
    const feed = await parser.parse(RSS);

    expect(feed.items[1].publishedAt).toBeNull();
    expect(feed.items[1].guid).toBe("");
  });

  it("should read Atom entries with summary, id and updated", async () => {
    const feed = await parser.parse(ATOM);

    expect(feed.title).toBe("Atom Example");
    expect(feed.items).toHaveLength(1);
    expect(feed.items[0].link).toBe("https://atom.example.org/posts/1");
    expect(feed.items[0].content).toBe("A short summary");
    expect(feed.items[0].guid).toBe("urn:example:1");
    expect(feed.items[0].updatedAt).toEqual(new Date("2024-03-01T08:00:00.000Z"));
  });

  it("should report the feed type, description and update date", async () => {
    const rss = await parser.parse(RSS);
    const atom = await parser.parse(ATOM);

    expect(rss).toMatchObject({
      feedType: "rss",
      description: "Daily notes",
      updatedAt: new Date("2024-03-07T06:00:00.000Z"),
    });
    expect(atom).toMatchObject({
      feedType: "atom",
      updatedAt: new Date("2024-03-02T08:00:00.000Z"),
    });
  });

  it("should raise a parse error for a non-feed document", async () => {
    await expect(parser.parse("<html><body>hi</body></html>")).rejects.toMatchObject({
      kind: "parse",
    });
  });
});
