import { z } from "zod";
import { ValidationError } from "./errors";

/**
 * Files the generator always writes. Attachments may not reuse these paths.
 */
export const GENERATED_FILE_NAMES: readonly string[] = ["index.html", "style.css", "script.js", "README.md", "LICENSE"];

const httpUrl = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), { message: "must be an http(s) URL" });

export const attachmentSchema = z.object({
  name: z.string().trim().min(1, "attachment name is required"),
  url: z
    .string()
    .min(1, "attachment url is required")
    .refine((value) => /^(data:|https?:\/\/)/i.test(value), {
      message: "must be a data URI or an http(s) URL",
    }),
});

export const submissionSchema = z
  .object({
    email: z.string().min(1),
    secret: z.string().min(1),
    task: z.string().trim().min(1),
    round: z.number().int().min(1),
    nonce: z.string().min(1),
    brief: z.string().min(1),
    checks: z.array(z.string()),
    evaluation_url: httpUrl,
    attachments: z.array(attachmentSchema).default([]),
  })
  .superRefine((payload, ctx) => {
    const seen = new Set<string>();
    payload.attachments.forEach((attachment, index) => {
      const problem = attachmentPathProblem(attachment.name);
      if (problem) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["attachments", index, "name"],
          message: problem,
        });
      }
      if (seen.has(attachment.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["attachments", index, "name"],
          message: `duplicate attachment name "${attachment.name}"`,
        });
      }
      seen.add(attachment.name);
    });
  });

export type Attachment = z.infer<typeof attachmentSchema>;
export type SubmissionRequest = z.infer<typeof submissionSchema>;

/**
 * Body returned to the caller once the app is deployed.
 */
export interface SubmissionResponse {
  email: string;
  task: string;
  round: number;
  nonce: string;
  repo_url: string;
  commit_sha: string;
  pages_url: string;
}

/**
 * Body posted to the evaluation URL.
 */
export interface EvaluationNotice extends SubmissionResponse {
  latency_ms: number;
}

/**
 * Explain why a name cannot be used as a repository path, or null if it can.
 */
export function attachmentPathProblem(name: string): string | null {
  if (name.startsWith("/") || name.includes("\\")) {
    return `attachment name "${name}" must be a relative path`;
  }
  const segments = name.split("/");
  if (segments.some((segment) => segment === "" || segment === "." || segment === "..")) {
    return `attachment name "${name}" contains an empty or relative segment`;
  }
  if (segments[0] === ".git") {
    return `attachment name "${name}" points into .git`;
  }
  if (GENERATED_FILE_NAMES.includes(name)) {
    return `attachment name "${name}" collides with a generated file`;
  }
  return null;
}

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Parse an untrusted request body into a SubmissionRequest.
 * Throws ValidationError listing every problem found.
 */
export function parseSubmission(body: unknown): SubmissionRequest {
  const result = submissionSchema.safeParse(body);
  if (!result.success) {
    throw new ValidationError("Invalid submission", formatIssues(result.error));
  }
  return result.data;
}
