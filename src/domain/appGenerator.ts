/**
 * What a generator needs to know to build a static app.
 */
export interface GenerationInput {
  task: string;
  round: number;
  brief: string;
  checks: string[];
  /** Paths of attachments that will sit beside the generated files. */
  attachments: string[];
  /** Files currently deployed, when revising an earlier round. */
  existing?: ExistingSite;
}

export interface ExistingSite {
  indexHtml: string | null;
  scriptJs: string | null;
}

export type GenerationSource = "llm" | "template";

export interface GeneratedSite {
  /** Text file contents keyed by repository path. */
  files: Record<string, string>;
  source: GenerationSource;
}

export interface AppGenerator {
  /**
   * Produce the static site for a brief.
   * Returns a promise since real generators call external APIs.
   */
  generate(input: GenerationInput): Promise<GeneratedSite>;
}
