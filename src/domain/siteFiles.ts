import fs from "fs";
import path from "path";

const TEMPLATES_DIR = path.join(__dirname, "../../templates");

const templateCache = new Map<string, string>();

/**
 * Read a file from the templates directory. Contents are cached per process.
 */
export function loadTemplate(fileName: string): string {
  const cached = templateCache.get(fileName);
  if (cached !== undefined) {
    return cached;
  }
  const contents = fs.readFileSync(path.join(TEMPLATES_DIR, fileName), "utf-8");
  templateCache.set(fileName, contents);
  return contents;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

export function bulletList(items: string[], empty: string = "- (none)"): string {
  return items.length > 0 ? items.map((item) => `- ${item}`).join("\n") : empty;
}

/**
 * Models often wrap a file in a markdown fence even when asked not to.
 * Returns the fenced body when the whole reply is one fenced block.
 */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const match = /^```[\w-]*\s*\n([\s\S]*?)\n?```$/.exec(trimmed);
  return match ? match[1].trim() : trimmed;
}

export function styleCss(): string {
  return loadTemplate("style.css");
}

export function licenseText(year: number): string {
  return loadTemplate("LICENSE.txt").replace("{{year}}", String(year));
}

export function readmeFor(task: string, brief: string, checks: string[]): string {
  return `# ${task}

Static app generated from a task brief and served with GitHub Pages.

## Brief

${brief}

## Checks

${bulletList(checks)}

## Notes

- No build step: plain HTML, CSS and JavaScript.
- Attachments are committed next to index.html and loaded with fetch.
- Element IDs referenced by the checks are created on the page.

## License

MIT, see LICENSE.
`;
}

/**
 * The files shared by every generated site apart from index.html and script.js.
 */
export function supportFiles(task: string, brief: string, checks: string[], year: number): Record<string, string> {
  return {
    "style.css": styleCss(),
    "README.md": readmeFor(task, brief, checks),
    LICENSE: licenseText(year),
  };
}
