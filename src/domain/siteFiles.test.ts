import { bulletList, escapeHtml, licenseText, readmeFor, stripCodeFence, styleCss } from "./siteFiles";

describe("siteFiles", () => {
  describe("stripCodeFence", () => {
    it("returns the body of a fenced reply", () => {
      expect(stripCodeFence("```html\n<p>hi</p>\n```")).toBe("<p>hi</p>");
    });

    it("handles fences without a language", () => {
      expect(stripCodeFence("```\nconsole.log(1);\n```\n")).toBe("console.log(1);");
    });

    it("leaves unfenced text alone apart from trimming", () => {
      expect(stripCodeFence("  <p>hi</p>\n")).toBe("<p>hi</p>");
    });

    it("does not strip fences that only wrap part of the reply", () => {
      const reply = "Here you go:\n```js\nrun();\n```";

      expect(stripCodeFence(reply)).toBe(reply);
    });
  });

  describe("escapeHtml", () => {
    it("escapes markup characters", () => {
      expect(escapeHtml(`<a href="x">Tom & 'Jerry'</a>`)).toBe(
        "&lt;a href=&quot;x&quot;&gt;Tom &amp; &#39;Jerry&#39;&lt;/a&gt;"
      );
    });
  });

  describe("bulletList", () => {
    it("prefixes each item", () => {
      expect(bulletList(["one", "two"])).toBe("- one\n- two");
    });

    it("uses the placeholder for an empty list", () => {
      expect(bulletList([])).toBe("- (none)");
    });
  });

  describe("templates", () => {
    it("fills the license year", () => {
      const license = licenseText(2026);

      expect(license.startsWith("MIT License\n\nCopyright (c) 2026\n")).toBe(true);
    });

    it("loads the stylesheet", () => {
      expect(styleCss()).toContain("#result {");
    });

    it("lists checks in the readme", () => {
      const readme = readmeFor("demo", "Show a greeting.", ["#greeting exists"]);

      expect(readme.startsWith("# demo\n")).toBe(true);
      expect(readme).toContain("## Brief\n\nShow a greeting.\n");
      expect(readme).toContain("## Checks\n\n- #greeting exists\n");
    });
  });
});
