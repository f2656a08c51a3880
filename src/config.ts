import path from "path";
import { z } from "zod";
import { formatIssues } from "./domain/submission";

function blankToUndefined(value: unknown): unknown {
  return typeof value === "string" && value.trim() === "" ? undefined : value;
}

const requiredString = (name: string) =>
  z.preprocess(blankToUndefined, z.string({ required_error: `${name} is required` }).trim());

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional());

const envSchema = z.object({
  STUDENT_EMAIL: requiredString("STUDENT_EMAIL"),
  STUDENT_SECRET: requiredString("STUDENT_SECRET"),
  GITHUB_TOKEN: requiredString("GITHUB_TOKEN"),
  GH_USERNAME: requiredString("GH_USERNAME"),
  GH_REPO_PREFIX: z.string().default("tds-"),
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.preprocess(blankToUndefined, z.string().trim().default("gpt-4o-mini")),
  API_PORT: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(3001)),
  HTTP_TIMEOUT: z.preprocess(blankToUndefined, z.coerce.number().positive().default(20)),
  NOTIFY_RETRIES: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).default(3)),
  DATA_DIR: optionalString,
});

export interface AppConfig {
  studentEmail: string;
  studentSecret: string;
  githubToken: string;
  githubUsername: string;
  repoPrefix: string;
  openaiApiKey: string | null;
  openaiModel: string;
  port: number;
  httpTimeoutMs: number;
  notifyRetries: number;
  dataDir: string;
}

/**
 * Read configuration from environment variables.
 * Throws listing every missing or invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new Error(`Invalid configuration: ${formatIssues(result.error).join("; ")}`);
  }

  const vars = result.data;
  return {
    studentEmail: vars.STUDENT_EMAIL,
    studentSecret: vars.STUDENT_SECRET,
    githubToken: vars.GITHUB_TOKEN,
    githubUsername: vars.GH_USERNAME,
    repoPrefix: vars.GH_REPO_PREFIX,
    openaiApiKey: vars.OPENAI_API_KEY ?? null,
    openaiModel: vars.OPENAI_MODEL,
    port: vars.API_PORT,
    httpTimeoutMs: Math.round(vars.HTTP_TIMEOUT * 1000),
    notifyRetries: vars.NOTIFY_RETRIES,
    dataDir: path.resolve(vars.DATA_DIR ?? "data"),
  };
}
