import OpenAI from "openai";
import { AppGenerator, GenerationInput, GeneratedSite } from "./appGenerator";
import { TemplateAppGenerator } from "./templateAppGenerator";
import { bulletList, stripCodeFence, supportFiles } from "./siteFiles";

export interface LLMAppGeneratorOptions {
  model?: string;
  timeoutMs?: number;
  fallback?: AppGenerator;
  now?: () => Date;
}

const HTML_SYSTEM_PROMPT = "You write compact, production-ready HTML/CSS/JS.";
const SCRIPT_SYSTEM_PROMPT = "You write robust, minimal vanilla JS for static pages.";

/**
 * LLMAppGenerator asks an OpenAI chat model for index.html and script.js.
 *
 * style.css, README.md and LICENSE are not generated; they come from templates.
 * If either completion fails or comes back empty, the fallback generator
 * builds the whole site.
 */
export class LLMAppGenerator implements AppGenerator {
  private client: OpenAI;
  private model: string;
  private fallback: AppGenerator;
  private now: () => Date;

  constructor(apiKey?: string, options: LLMAppGeneratorOptions = {}) {
    this.client = new OpenAI({
      apiKey: apiKey || process.env.OPENAI_API_KEY,
      timeout: options.timeoutMs ?? 60_000,
    });
    this.model = options.model ?? "gpt-4o-mini";
    this.now = options.now ?? (() => new Date());
    this.fallback = options.fallback ?? new TemplateAppGenerator(this.now);
  }

  async generate(input: GenerationInput): Promise<GeneratedSite> {
    let indexHtml: string;
    let scriptJs: string;

    try {
      indexHtml = await this.complete(HTML_SYSTEM_PROMPT, buildIndexHtmlPrompt(input));
      scriptJs = await this.complete(SCRIPT_SYSTEM_PROMPT, buildScriptJsPrompt(input));
    } catch (error) {
      console.error(`[llm] Generation failed for task ${input.task}, using template:`, error);
      return this.fallback.generate(input);
    }

    return {
      source: "llm",
      files: {
        "index.html": indexHtml,
        "script.js": scriptJs,
        ...supportFiles(input.task, input.brief, input.checks, this.now().getFullYear()),
      },
    };
  }

  private async complete(systemPrompt: string, userPrompt: string): Promise<string> {
    const completion = await this.client.chat.completions.create({
      model: this.model,
      messages: [
        { role: "system", content: systemPrompt },
        { role: "user", content: userPrompt },
      ],
      temperature: 0.2,
    });

    const content = completion.choices[0]?.message?.content;
    if (!content || !content.trim()) {
      throw new Error("No response from LLM");
    }
    return stripCodeFence(content);
  }
}

function currentImplementation(input: GenerationInput, key: "indexHtml" | "scriptJs", label: string): string {
  const current = input.existing?.[key];
  if (!current) {
    return "";
  }
  return `
This is round ${input.round}: revise the currently deployed ${label} below
rather than starting over. Keep everything that still satisfies the brief.

Current ${label}:
---
${current}
---
`;
}

export function buildIndexHtmlPrompt(input: GenerationInput): string {
  return `You are a senior front-end engineer. Build a static, GitHub Pages friendly
single-page app that satisfies:

Brief:
${input.brief}

Checks to consider (selectors/behaviors expected by graders):
${bulletList(input.checks)}

Attachments in repo (filenames):
${bulletList(input.attachments)}
${currentImplementation(input, "indexHtml", "index.html")}
Rules:
- No build step, no bundlers, no frameworks. Plain HTML+CSS+JS.
- If checks mention Bootstrap, include its CSS from jsDelivr.
- Create elements/IDs referenced in checks (e.g., #total-sales).
- Parse query params if checks mention ?url= or ?token=.
- If data files are present (e.g., data.csv, rates.json), load them via fetch('./data.csv').
- Include an aria-live region if instructed.
- Keep the page accessible and responsive.
- Link to style.css and script.js.

Return ONLY the HTML for index.html.`;
}

export function buildScriptJsPrompt(input: GenerationInput): string {
  return `Write vanilla JavaScript implementing the page logic.

Brief:
${input.brief}

Checks:
${bulletList(input.checks)}

Attachments available locally:
${bulletList(input.attachments)}
${currentImplementation(input, "scriptJs", "script.js")}
Requirements:
- Implement the calculations/DOM updates implied by checks.
- If a CSV attachment exists, fetch it and parse it to compute the values the checks expect.
- If a JSON attachment exists, fetch it and use it.
- If checks reference localStorage or aria-live, implement it.
- Populate the specific IDs referenced by checks.
- Keep the script short and commented.

Return ONLY the JavaScript (no HTML).`;
}
