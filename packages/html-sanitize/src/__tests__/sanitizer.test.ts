import { JSDOM } from "jsdom";
import { afterEach, describe, expect, it, vi } from "vitest";
import { sanitizeHtml } from "../html.js";
import { HtmlSanitizer } from "../sanitizer.js";
import type { HtmlSanitizerConfig } from "../types.js";

function clean(html: string, config: HtmlSanitizerConfig): string {
  return sanitizeHtml(html, new HtmlSanitizer(config));
}

function bodyDocument(html: string): Document {
  const { document } = new JSDOM(`<!DOCTYPE html><body>${html}</body>`).window;
  return document;
}

describe("HtmlSanitizer", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("construction", () => {
    it("compiles the base and extended whitelists", () => {
      const sanitizer = new HtmlSanitizer({
        validElements: "p,a[href]",
        extendedValidElements: "a[href|title]",
      });
      const rule = sanitizer.rules.elements.get("a");

      expect([...sanitizer.rules.elements.keys()]).toEqual(["p", "a"]);
      expect([...(rule?.attributes.keys() ?? [])]).toEqual(["href", "title"]);
    });

    it("warns when the whitelist is empty", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      new HtmlSanitizer();
      expect(warn).toHaveBeenCalledWith(
        "[html-sanitize] Whitelist is empty: every element will be unwrapped",
      );
    });

    it("does not warn for a non-empty whitelist", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      new HtmlSanitizer({ validElements: "p" });
      expect(warn).not.toHaveBeenCalled();
    });
  });

  describe("disallowed elements", () => {
    it("unwraps them, keeping their content in place", () => {
      expect(clean("<p>Hello <span>big <b>world</b></span>!</p>", { validElements: "p,b" })).toBe(
        "<p>Hello big <b>world</b>!</p>",
      );
    });

    it("visits children exposed by unwrapping", () => {
      expect(
        clean('<div><span><em onclick="x">a</em></span><p class="c">b</p></div>', {
          validElements: "p",
        }),
      ).toBe("a<p>b</p>");
    });

    it("keeps sibling order when unwrapping several levels", () => {
      expect(clean("<div>1<section>2<b>3</b>4</section>5</div>", { validElements: "b" })).toBe(
        "12<b>3</b>45",
      );
    });

    it("removes script and style with their content", () => {
      expect(
        clean("<p>a<script>alert(1)</script>b</p><style>p { color: red }</style>", {
          validElements: "p",
        }),
      ).toBe("<p>ab</p>");
    });

    it("removes scripts nested inside unwrapped elements", () => {
      expect(clean("<div><script>bad()</script>text</div>", { validElements: "p" })).toBe("text");
    });

    it("removes whitelisted script and style with their content when they fail after tidying", () => {
      const config = { validElements: "p,script[!src],style[!media<screen]" };
      const once = clean(
        '<p>a<script src="javascript:x()">run()</script>b<style media="print">p{}</style>c</p>',
        config,
      );

      expect(once).toBe("<p>abc</p>");
      expect(clean(once, config)).toBe(once);
    });

    it("unwraps everything under an empty whitelist", () => {
      vi.spyOn(console, "warn").mockImplementation(() => {});
      expect(clean('<p>a <a href="/x">b</a></p>', {})).toBe("a b");
    });
  });

  describe("attributes", () => {
    it("removes attributes that are not whitelisted", () => {
      expect(
        clean('<a href="x" title="y" onclick="z">link</a>', { validElements: "a[href|title]" }),
      ).toBe('<a href="x" title="y">link</a>');
    });

    it("removes attributes outside the valid values", () => {
      expect(
        clean('<a target="_top">a</a><a target="_self">b</a>', {
          validElements: "a[target<_blank?_self]",
          linkRelValue: null,
        }),
      ).toBe('<a>a</a><a target="_self">b</a>');
    });

    it("keeps attributes matched by a pattern", () => {
      expect(
        clean('<div data-id="1" data-role="x" id="d">a</div>', { validElements: "div[data-*]" }),
      ).toBe('<div data-id="1" data-role="x">a</div>');
    });

    it("applies global attributes to later elements", () => {
      expect(
        clean('<p id="i" class="c" style="s">x</p><span id="j" class="k" title="t">y</span>', {
          validElements: "@[id|class],p,span[-class|title]",
        }),
      ).toBe('<p id="i" class="c">x</p><span id="j" title="t">y</span>');
    });
  });

  describe("required attributes", () => {
    it("strips elements missing every required attribute", () => {
      expect(
        clean('<img alt="a"><img src="" alt="b"><img src="pic.png" alt="c">', {
          validElements: "img[!src|alt]",
        }),
      ).toBe('<img src="pic.png" alt="c">');
    });

    it("accepts any one of several required attributes", () => {
      expect(
        clean('<a name="top">a</a><a href="/x">b</a><a>c</a>', {
          validElements: "a[!href|!name]",
        }),
      ).toBe('<a name="top">a</a><a href="/x">b</a>c');
    });

    it("strips elements whose required attribute was filtered out", () => {
      expect(clean('<p><img src="c.png"></p>', { validElements: "p,img[!src<a.png?b.png]" })).toBe(
        "<p></p>",
      );
    });

    it("strips elements whose required attribute was a dangerous URI", () => {
      expect(clean('<a href="javascript:go()">x</a>', { validElements: "a[!href]" })).toBe("x");
    });

    it("removes a script whose required source was a dangerous URI, content included", () => {
      const config = { validElements: "p,script[!src]" };
      const once = clean(
        '<p><script src="javascript:alert(1)">steal(document.cookie)</script>x</p>',
        config,
      );

      expect(once).toBe("<p>x</p>");
      expect(clean(once, config)).toBe(once);
    });

    it("removes a style whose required attribute was filtered out, content included", () => {
      const config = { validElements: "p,style[!media<screen]" };
      const once = clean('<p><style media="print">body{display:none}</style>x</p>', config);

      expect(once).toBe("<p>x</p>");
      expect(clean(once, config)).toBe(once);
    });
  });

  describe("default and forced values", () => {
    it("keeps an existing value under a default rule", () => {
      expect(
        clean('<a href="/x" rel="other">l</a>', { validElements: "a[href|rel=nofollow]" }),
      ).toBe('<a href="/x" rel="other">l</a>');
    });

    it("fills in a missing value under a default rule", () => {
      expect(clean('<a href="/x">l</a>', { validElements: "a[href|rel=nofollow]" })).toBe(
        '<a href="/x" rel="nofollow">l</a>',
      );
    });

    it("fills in an empty value under a default rule", () => {
      expect(clean('<img src="a.png" alt="">', { validElements: "img[src|alt=image]" })).toBe(
        '<img src="a.png" alt="image">',
      );
    });

    it("overwrites an existing value under a forced rule", () => {
      expect(
        clean('<a href="/x" rel="other">l</a>', { validElements: "a[href|rel:nofollow]" }),
      ).toBe('<a href="/x" rel="nofollow">l</a>');
    });
  });

  describe("dangerous URIs", () => {
    const config: HtmlSanitizerConfig = { validElements: "a[href],img[src],object[data]" };

    it("removes javascript: hrefs", () => {
      expect(clean('<a href="javascript:alert(1)">x</a>', config)).toBe("<a>x</a>");
    });

    it("removes tab-obfuscated javascript: hrefs", () => {
      expect(clean('<a href="jav&#9;ascript:alert(1)">x</a>', config)).toBe("<a>x</a>");
    });

    it("removes data:text/html sources", () => {
      expect(clean('<img src="data:text/html;base64,PHA+">', config)).toBe("<img>");
      expect(clean('<object data="data:text/html;base64,PHA+">o</object>', config)).toBe(
        "<object>o</object>",
      );
    });

    it("keeps safe URLs", () => {
      expect(clean('<a href="https://example.com">x</a>', config)).toBe(
        '<a href="https://example.com">x</a>',
      );
    });

    it("removes dangerous values supplied by a forced rule", () => {
      expect(clean('<a href="/x">x</a>', { validElements: "a[href:javascript:void(0)]" })).toBe(
        "<a>x</a>",
      );
    });
  });

  describe("link rel policy", () => {
    const config: HtmlSanitizerConfig = { validElements: "a[href|target|rel]" };

    it("adds rel to links that open a new window", () => {
      expect(clean('<a href="/x" target="_blank">x</a>', config)).toBe(
        '<a href="/x" target="_blank" rel="noopener noreferrer">x</a>',
      );
    });

    it("removes rel again once the target is gone", () => {
      const document = bodyDocument('<a href="/x" target="_blank">x</a>');
      const sanitizer = new HtmlSanitizer(config);

      sanitizer.sanitize(document);
      const link = document.querySelector("a");
      expect(link?.getAttribute("rel")).toBe("noopener noreferrer");

      link?.removeAttribute("target");
      sanitizer.sanitize(document);
      expect(document.body.innerHTML).toBe('<a href="/x">x</a>');
    });

    it("can be disabled", () => {
      expect(
        clean('<a href="/x" target="_blank">x</a>', { ...config, linkRelValue: null }),
      ).toBe('<a href="/x" target="_blank">x</a>');
    });

    it("strips rel when configured with an empty value", () => {
      expect(
        clean('<a href="/x" target="_blank" rel="opener">x</a>', { ...config, linkRelValue: "" }),
      ).toBe('<a href="/x" target="_blank">x</a>');
    });

    it("uses a custom rel value", () => {
      expect(
        clean('<a target="_blank">x</a>', { validElements: "a[target]", linkRelValue: "noopener" }),
      ).toBe('<a target="_blank" rel="noopener">x</a>');
    });

    it("is not applied to links that were unwrapped", () => {
      expect(clean('<p><a href="/x" target="_blank">x</a></p>', { validElements: "p" })).toBe(
        "<p>x</p>",
      );
    });
  });

  describe("patterns", () => {
    it("uses the exact rule over a matching pattern", () => {
      expect(
        clean(
          '<table><tbody><tr><td class="a" id="b">x</td><th class="a" id="b">y</th></tr></tbody></table>',
          { validElements: "table,tbody,tr,td[class],t*[id]" },
        ),
      ).toBe('<table><tbody><tr><td class="a">x</td><th id="b">y</th></tr></tbody></table>');
    });

    it("allows elements through a pattern rule", () => {
      expect(clean("<h1>a</h1><h2>b</h2><hgroup>c</hgroup>", { validElements: "h?" })).toBe(
        "<h1>a</h1><h2>b</h2>c",
      );
    });
  });

  describe("empty elements", () => {
    it("pads empty elements declared with #", () => {
      expect(clean("<span></span>", { validElements: "#span" })).toBe("<span>&nbsp;</span>");
    });

    it("leaves non-empty padded elements alone", () => {
      expect(clean("<span>x</span>", { validElements: "#span" })).toBe("<span>x</span>");
    });

    it("strips empty elements declared with -", () => {
      expect(clean("<p><span></span>text</p>", { validElements: "p,-span" })).toBe("<p>text</p>");
    });

    it("keeps non-empty elements declared with -", () => {
      expect(clean("<span>x</span>", { validElements: "-span" })).toBe("<span>x</span>");
    });

    it("strips elements emptied by removing their content", () => {
      expect(
        clean("<p><span><script>x()</script></span>y</p>", { validElements: "p,-span" }),
      ).toBe("<p>y</p>");
    });

    it("strips ancestors emptied in turn", () => {
      expect(
        clean("<div><span><style>a{}</style></span></div><p>z</p>", {
          validElements: "-div,-span,p",
        }),
      ).toBe("<p>z</p>");
    });

    it("pads elements emptied by removing their content", () => {
      expect(clean("<p><script>x()</script></p>", { validElements: "#p" })).toBe(
        "<p>&nbsp;</p>",
      );
    });
  });

  describe("idempotence", () => {
    const config: HtmlSanitizerConfig = {
      validElements: "p[id],b,a[href|target|rel],#span",
    };
    const input =
      '<div class="x"><p id="a" onclick="z">Hello <b>bold</b><script>bad()</script></p>' +
      '<a href="javascript:x" target="_blank">link</a><span></span></div>';

    it("produces the expected document", () => {
      expect(clean(input, config)).toBe(
        '<p id="a">Hello <b>bold</b></p><a target="_blank" rel="noopener noreferrer">link</a>' +
          "<span>&nbsp;</span>",
      );
    });

    it("changes nothing on a second pass", () => {
      const sanitizer = new HtmlSanitizer(config);
      const once = sanitizeHtml(input, sanitizer);
      expect(sanitizeHtml(once, sanitizer)).toBe(once);
    });
  });

  describe("documents", () => {
    it("sanitizes the document it is given in place", () => {
      const document = bodyDocument('<p>a<font color="red">b</font></p>');
      new HtmlSanitizer({ validElements: "p" }).sanitize(document);
      expect(document.body.innerHTML).toBe("<p>ab</p>");
    });

    it("leaves content outside the body alone", () => {
      const { document } = new JSDOM(
        "<!DOCTYPE html><html><head><title>t</title></head><body><i>x</i></body></html>",
      ).window;
      new HtmlSanitizer({ validElements: "p" }).sanitize(document);

      expect(document.head.innerHTML).toBe("<title>t</title>");
      expect(document.body.innerHTML).toBe("x");
    });

    it("does nothing for a document without a body", () => {
      const { document } = new JSDOM("<root><script>x</script></root>", {
        contentType: "application/xml",
      }).window;
      new HtmlSanitizer({ validElements: "p" }).sanitize(document);

      expect(document.body).toBeNull();
      expect(document.querySelector("script")?.textContent).toBe("x");
    });

    it("can be reused across documents", () => {
      const sanitizer = new HtmlSanitizer({ validElements: "b" });
      expect(sanitizeHtml("<i>a</i><b>b</b>", sanitizer)).toBe("a<b>b</b>");
      expect(sanitizeHtml("<u>c</u><b>d</b>", sanitizer)).toBe("c<b>d</b>");
    });
  });
});
