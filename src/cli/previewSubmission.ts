#!/usr/bin/env node
import fs from "fs";
import path from "path";
import { AttachmentDecoder } from "../domain/attachments";
import { ValidationError, errorMessage } from "../domain/errors";
import { parseSubmission } from "../domain/submission";
import { TemplateAppGenerator } from "../domain/templateAppGenerator";

const USAGE = "Usage: brief-preview <request.json> [outDir]";

/**
 * Validate a submission file and write the template site it would produce,
 * plus its inline attachments, into outDir. Nothing is published.
 * Returns the written paths relative to outDir.
 */
export async function runPreview(requestPath: string, outDir: string): Promise<string[]> {
  let body: unknown;
  try {
    body = JSON.parse(fs.readFileSync(requestPath, "utf-8"));
  } catch (error) {
    throw new ValidationError(`Could not read ${requestPath}: ${errorMessage(error)}`);
  }

  const payload = parseSubmission(body);
  const inline = payload.attachments.filter((a) => a.url.toLowerCase().startsWith("data:"));
  for (const remote of payload.attachments.filter((a) => !inline.includes(a))) {
    console.log(`  skipping remote attachment ${remote.name} (${remote.url})`);
  }

  const attachments = await new AttachmentDecoder().decodeAll(inline);
  const site = await new TemplateAppGenerator().generate({
    task: payload.task,
    round: payload.round,
    brief: payload.brief,
    checks: payload.checks,
    attachments: payload.attachments.map((a) => a.name),
  });

  const files = new Map<string, Buffer>();
  for (const [name, text] of Object.entries(site.files)) {
    files.set(name, Buffer.from(text, "utf-8"));
  }
  for (const [name, bytes] of attachments) {
    files.set(name, bytes);
  }

  for (const [name, bytes] of files) {
    const target = path.join(outDir, name);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, bytes);
  }

  return [...files.keys()].sort();
}

async function main(): Promise<void> {
  const [requestPath, outDir = "preview-out"] = process.argv.slice(2);
  if (!requestPath) {
    console.error(USAGE);
    process.exitCode = 1;
    return;
  }

  try {
    const written = await runPreview(requestPath, outDir);
    console.log(`\nWrote ${written.length} file(s) to ${outDir}:`);
    written.forEach((name) => console.log(`  ${name}`));
  } catch (error) {
    console.error(`\n${errorMessage(error)}`);
    if (error instanceof ValidationError) {
      error.issues.forEach((issue) => console.error(`  - ${issue}`));
    }
    process.exitCode = 1;
  }
}

if (require.main === module) {
  void main();
}
