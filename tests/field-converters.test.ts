// tests/field-converters.test.ts
// ---------------------------------------------------------------------------
// Tests for markdown ↔ HTML field conversion.
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";
import {
  HtmlToMarkdownConverter,
  MarkdownToHtmlConverter,
  htmlToMarkdown,
  identityConverter,
  markdownToHtml,
} from "../src/anki/field-converters";

describe("markdownToHtml", () => {
  it("converts emphasis and joins lines with <br>", () => {
    expect(markdownToHtml("**bold** and *it*\nline2")).toBe("<b>bold</b> and <i>it</i><br>line2");
  });

  it("leaves underscores inside words alone", () => {
    expect(markdownToHtml("snake_case_name")).toBe("snake_case_name");
  });

  it("converts underscore italics", () => {
    expect(markdownToHtml("an _aside_ here")).toBe("an <i>aside</i> here");
  });

  it("does not format inside code spans", () => {
    expect(markdownToHtml("use `a*b*c` here")).toBe("use <code>a*b*c</code> here");
  });

  it("converts strikethrough and highlight", () => {
    expect(markdownToHtml("~~gone~~ ==hi==")).toBe("<s>gone</s> <mark>hi</mark>");
  });

  it("renders fenced code as escaped <pre>", () => {
    expect(markdownToHtml("Intro\n```\nif (a < b) {}\n```\nAfter")).toBe(
      "Intro<pre><code>if (a &lt; b) {}</code></pre>After",
    );
  });

  it("returns an empty string for empty input", () => {
    expect(markdownToHtml("")).toBe("");
  });
});

describe("htmlToMarkdown", () => {
  it("converts bold and line breaks", () => {
    expect(htmlToMarkdown("<b>bold</b> text<br>next")).toBe("**bold** text\nnext");
  });

  it("does not read <br> as bold", () => {
    expect(htmlToMarkdown("a<br>b <b>c</b>")).toBe("a\nb **c**");
  });

  it("pads emphasis that touches a word", () => {
    expect(htmlToMarkdown("un<i>break</i>able")).toBe("un *break* able");
  });

  it("converts headings and rules", () => {
    expect(htmlToMarkdown("<h2>Title</h2>text<hr>more")).toBe("## Title\ntext\n***\nmore");
  });

  it("turns adjacent divs into lines", () => {
    expect(htmlToMarkdown("<div>a</div><div>b</div>")).toBe("a\nb");
  });

  it("decodes entities, &amp; last", () => {
    expect(htmlToMarkdown("&lt;tag&gt; &amp;amp;")).toBe("<tag> &amp;");
  });

  it("converts unordered and ordered lists", () => {
    expect(htmlToMarkdown("<ul><li>one</li><li>two</li></ul>")).toBe("- one\n- two");
    expect(htmlToMarkdown("<ol><li>one</li><li>two</li></ol>")).toBe("1. one\n2. two");
  });

  it("converts <pre> into a fence", () => {
    expect(htmlToMarkdown("<pre>x = 1\ny = 2</pre>")).toBe("```\nx = 1\ny = 2\n```");
  });

  it("converts tables with a header rule", () => {
    expect(htmlToMarkdown("<table><tr><th>a</th><th>b</th></tr><tr><td>1</td><td>2</td></tr></table>")).toBe(
      "| a | b |\n| --- | --- |\n| 1 | 2 |",
    );
  });

  it("keeps <sub>, <sup> and <u>", () => {
    expect(htmlToMarkdown("H<sub>2</sub>O and <u>x</u><sup>2</sup>")).toBe("H<sub>2</sub>O and <u>x</u><sup>2</sup>");
  });

  it("converts images and links", () => {
    expect(htmlToMarkdown('<img src="cat.png">')).toBe("![](cat.png)");
    expect(htmlToMarkdown('<a href="https://example.com">site</a>')).toBe("[site](https://example.com)");
  });

  it("strips unknown tags", () => {
    expect(htmlToMarkdown('<span style="color: red">red</span>')).toBe("red");
  });
});

describe("converters", () => {
  it("round-trips simple formatting", () => {
    const md = "**bold** and *it*\nline2";
    const html = new MarkdownToHtmlConverter().convert(md);
    expect(new HtmlToMarkdownConverter().convert(html)).toBe(md);
  });

  it("identity returns its input", () => {
    expect(identityConverter.convert("<b>x</b>")).toBe("<b>x</b>");
  });
});
