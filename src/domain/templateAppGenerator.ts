import { AppGenerator, GenerationInput, GeneratedSite } from "./appGenerator";
import { escapeHtml, supportFiles } from "./siteFiles";

/**
 * TemplateAppGenerator builds a placeholder site without calling a model.
 * Used when no OPENAI_API_KEY is configured or when generation fails.
 */
export class TemplateAppGenerator implements AppGenerator {
  private now: () => Date;

  constructor(now: () => Date = () => new Date()) {
    this.now = now;
  }

  async generate(input: GenerationInput): Promise<GeneratedSite> {
    return {
      source: "template",
      files: {
        "index.html": this.indexHtml(input),
        "script.js": this.scriptJs(),
        ...supportFiles(input.task, input.brief, input.checks, this.now().getFullYear()),
      },
    };
  }

  private indexHtml(input: GenerationInput): string {
    const checks = input.checks.length > 0 ? input.checks.map(escapeHtml).join(", ") : "(none)";
    const attachments = input.attachments
      .map((name) => `<li><a href="${escapeHtml(name)}">${escapeHtml(name)}</a></li>`)
      .join("");

    return `<!doctype html>
<html lang="en">
<head>
  <meta charset="utf-8"/>
  <meta name="viewport" content="width=device-width,initial-scale=1"/>
  <title>${escapeHtml(input.task)}</title>
  <link rel="stylesheet" href="style.css">
</head>
<body>
  <main>
    <h1>${escapeHtml(input.task)}</h1>
    <p><strong>Brief:</strong> ${escapeHtml(input.brief)}</p>
    <p><strong>Checks:</strong> ${checks}</p>
    <ul id="attachments">${attachments}</ul>
    <div id="result" aria-live="polite">Set OPENAI_API_KEY to enable full generation.</div>
  </main>
  <script src="script.js"></script>
</body>
</html>
`;
  }

  private scriptJs(): string {
    return `(function () {
  const out = document.getElementById("result");
  const params = new URLSearchParams(location.search);
  if (out && params.toString()) out.textContent = "Params: " + params.toString();
})();
`;
  }
}
