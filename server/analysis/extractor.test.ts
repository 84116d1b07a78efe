import { describe, expect, it } from "vitest";
import { parseDocument, extractVisibleText } from "./document";
import {
  NO_DESCRIPTION,
  NO_KEYWORDS,
  NO_TITLE,
  NOT_SET,
  auditImages,
  classifyLinks,
  countWords,
  extractHeadings,
  extractKeywords,
  extractMetaData,
} from "./extractor";

describe("extractMetaData", () => {
  it("reads title, description, keywords and Open Graph tags", () => {
    const doc = parseDocument(
      [
        "<html><head>",
        "<title>  Acme Widgets  </title>",
        '<meta name="description" content="Widgets for everyone">',
        '<meta name="keywords" content="widgets, acme">',
        '<meta property="og:title" content="Acme">',
        '<meta property="og:description" content="">',
        "</head><body></body></html>",
      ].join("\n")
    );

    expect(extractMetaData(doc)).toEqual({
      title: "Acme Widgets",
      titleLength: 12,
      description: "Widgets for everyone",
      descriptionLength: 20,
      metaKeywords: "widgets, acme",
      ogTitle: "Acme",
      ogDescription: NOT_SET,
    });
  });

  it("falls back to sentinels and counts their length", () => {
    const meta = extractMetaData(parseDocument("<html><body><p>hi</p></body></html>"));

    expect(meta.title).toBe(NO_TITLE);
    expect(meta.titleLength).toBe(14);
    expect(meta.description).toBe(NO_DESCRIPTION);
    expect(meta.descriptionLength).toBe(20);
    expect(meta.metaKeywords).toBe(NO_KEYWORDS);
    expect(meta.ogTitle).toBe(NOT_SET);
    expect(meta.ogDescription).toBe(NOT_SET);
  });

  it("keeps an empty title element as an empty title", () => {
    const meta = extractMetaData(parseDocument("<html><head><title>   </title></head></html>"));

    expect(meta.title).toBe("");
    expect(meta.titleLength).toBe(0);
  });

  it("uses the first title and the first description tag only", () => {
    const doc = parseDocument(
      '<title>One</title><title>Two</title><meta name="description" content=""><meta name="description" content="Later">'
    );
    const meta = extractMetaData(doc);

    expect(meta.title).toBe("One");
    expect(meta.description).toBe(NO_DESCRIPTION);
  });

  it("survives malformed markup", () => {
    const meta = extractMetaData(parseDocument("<title>Broken <b>page</title><meta name=description content='x"));

    expect(meta.title).toBe("Broken <b>page");
  });
});

describe("extractHeadings", () => {
  it("collects trimmed heading text per level in document order", () => {
    const doc = parseDocument("<h1> Main </h1><h2>A</h2><h2>B</h2><h2>A</h2><h3></h3>");

    expect(extractHeadings(doc)).toEqual({
      h1: ["Main"],
      h2: ["A", "B", "A"],
      h3: [""],
      h4: [],
      h5: [],
      h6: [],
    });
  });
});

describe("extractKeywords", () => {
  it("drops stop words and short tokens", () => {
    expect(extractKeywords("The quick brown fox jumps")).toEqual([
      { term: "quick", frequency: 1 },
      { term: "brown", frequency: 1 },
      { term: "jumps", frequency: 1 },
    ]);
  });

  it("orders by frequency and keeps first-seen order for ties", () => {
    expect(extractKeywords("alpha beta alpha gamma beta alpha delta")).toEqual([
      { term: "alpha", frequency: 3 },
      { term: "beta", frequency: 2 },
      { term: "gamma", frequency: 1 },
      { term: "delta", frequency: 1 },
    ]);
  });

  it("strips digits and punctuation before splitting", () => {
    expect(extractKeywords("web3.0 Hello, WORLD! hello-world")).toEqual([
      { term: "hello", frequency: 1 },
      { term: "world", frequency: 1 },
      { term: "helloworld", frequency: 1 },
    ]);
    expect(extractKeywords("2024 1234")).toEqual([]);
  });

  it("removes long stop words", () => {
    expect(extractKeywords("these those would should might been from with have does testing")).toEqual([
      { term: "testing", frequency: 1 },
    ]);
  });

  it("truncates to topN", () => {
    expect(extractKeywords("aaaa bbbb cccc", 2)).toEqual([
      { term: "aaaa", frequency: 1 },
      { term: "bbbb", frequency: 1 },
    ]);
    expect(extractKeywords("aaaa bbbb cccc", 0)).toEqual([]);
  });

  it("returns non-increasing frequencies no longer than topN", () => {
    const text = "kiwi mango kiwi pear papaya mango kiwi lime lime lime lime guava";
    const keywords = extractKeywords(text, 3);

    expect(keywords.length).toBeLessThanOrEqual(3);
    for (let i = 1; i < keywords.length; i++) {
      expect(keywords[i].frequency).toBeLessThanOrEqual(keywords[i - 1].frequency);
    }
    expect(keywords[0]).toEqual({ term: "lime", frequency: 4 });
  });
});

describe("extractVisibleText", () => {
  it("skips script, style and noscript content", () => {
    const doc = parseDocument(
      "<html><head><title>Title</title><style>.x{}</style><script>var secret = 1;</script></head>" +
        "<body><p>Hello</p><noscript>enable js</noscript><p>World</p></body></html>"
    );

    expect(extractVisibleText(doc)).toBe("TitleHelloWorld");
    expect(doc.$("script").length).toBe(1);
  });

  it("leaves noscript headings to the heading extractor", () => {
    const doc = parseDocument("<body><noscript><h1>Enable scripts</h1></noscript><p>Body copy</p></body>");

    expect(extractVisibleText(doc)).toBe("Body copy");
    expect(extractHeadings(doc).h1).toEqual(["Enable scripts"]);
  });
});

describe("countWords", () => {
  it("counts whitespace separated tokens", () => {
    expect(countWords("  one two\n\tthree  ")).toBe(3);
    expect(countWords("")).toBe(0);
  });
});

describe("classifyLinks", () => {
  const html = [
    '<a href="/about">About</a>',
    '<a href="https://other.com/x">X</a>',
    '<a href="#top">Top</a>',
    '<a href="//cdn.example.com/lib.js">CDN</a>',
    '<a href="mailto:hi@example.com">Mail</a>',
    "<a>No href</a>",
    '<a href="/about">Again</a>',
    '<a href="https://example.com/contact">Contact</a>',
  ].join("");

  it("splits anchors into internal and external links", () => {
    expect(classifyLinks(parseDocument(html), "https://example.com/")).toEqual({
      internal: [
        "https://example.com/about",
        "https://example.com/#top",
        "mailto:hi@example.com",
        "https://example.com/about",
        "https://example.com/contact",
      ],
      external: ["https://other.com/x", "https://cdn.example.com/lib.js"],
    });
  });

  it("classifies every anchor with an href exactly once", () => {
    const doc = parseDocument(html);
    const links = classifyLinks(doc, "https://example.com/");

    expect(links.internal.length + links.external.length).toBe(doc.$("a[href]").length);
    expect(links.internal.some((url) => links.external.includes(url))).toBe(false);
  });

  it("resolves relative and empty hrefs against the page URL", () => {
    const doc = parseDocument('<a href="next">Next</a><a href="">Self</a>');

    expect(classifyLinks(doc, "https://example.com/blog/post")).toEqual({
      internal: ["https://example.com/blog/next", "https://example.com/blog/post"],
      external: [],
    });
  });
});

describe("auditImages", () => {
  it("counts images with and without alt text", () => {
    const doc = parseDocument(
      '<img src="a.png" alt="A"><img src="b.png" alt=""><img src="c.png"><img src="d.png" alt="D">'
    );

    expect(auditImages(doc)).toEqual({ total: 4, withAlt: 2, withoutAlt: 2 });
  });

  it("counts images inside noscript fallbacks", () => {
    const doc = parseDocument('<img src="a.png"><noscript><img src="a.png" alt="A"></noscript>');

    expect(auditImages(doc)).toEqual({ total: 2, withAlt: 1, withoutAlt: 1 });
  });

  it("reports zeros for a page without images", () => {
    expect(auditImages(parseDocument("<p>text</p>"))).toEqual({ total: 0, withAlt: 0, withoutAlt: 0 });
  });
});
