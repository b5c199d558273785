import { describe, expect, test } from "vitest";
import { cleanupText, extractMainContent, toReadable } from "./extractor";

const ARTICLE_HTML = `<!doctype html>
<html>
  <head><title>Field Notes</title></head>
  <body>
    <nav><a href="/">Home</a> <a href="/about">About</a></nav>
    <article>
      <h1>Field Notes</h1>
      <p>The river rose overnight and covered the lower path with a thin layer of silt. By morning the water had gone back down, leaving tracks from herons and one very confused raccoon along the bank.</p>
      <p>We measured the depth at three marker posts, and each one showed roughly the same line of debris. The gauge upstream agreed, which suggests the rise came from rain in the hills rather than anything local.</p>
      <p>Tomorrow we plan to walk the upper trail and check whether the footbridge held. If it did, the next survey can go ahead on schedule, and the samples from last week can be compared directly.</p>
    </article>
    <footer>Contact us</footer>
  </body>
</html>`;

describe("cleanupText", () => {
  test("trims surrounding blank lines and spaces", () => {
    expect(cleanupText("\n\r\n  body text  \n\n")).toBe("body text");
  });
});

describe("extractMainContent", () => {
  test("returns the article title and text", () => {
    const article = extractMainContent(ARTICLE_HTML, "https://example.com/notes");

    expect(article?.title).toBe("Field Notes");
    expect(article?.text).toContain("The river rose overnight");
    expect(article?.text).not.toContain("Contact us");
  });
});

describe("toReadable", () => {
  test("replaces title and text with the article", () => {
    const result = toReadable({
      url: "https://example.com/notes",
      title: "raw title",
      text: "Home About Field Notes ... Contact us",
      html: ARTICLE_HTML,
    });

    expect(result.title).toBe("Field Notes");
    expect(result.text).toContain("The river rose overnight");
    expect(result.text).not.toContain("Contact us");
    expect(result.html).toBe(ARTICLE_HTML);
  });

  test("leaves results without html as they are", () => {
    const pdf = { url: "https://example.com/doc.pdf", title: "doc.pdf", text: "page", html: "" };

    expect(toReadable(pdf)).toBe(pdf);
  });

  test("leaves pages without article text as they are", () => {
    const empty = { url: "https://example.com/", title: "Blank", text: "", html: "<html><body></body></html>" };

    expect(toReadable(empty)).toBe(empty);
  });
});
