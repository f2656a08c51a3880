import { Router } from "express";
import { loadTemplate } from "../../domain/siteFiles";

export interface PreviewResult {
  task: string;
  brief: string;
  checks: string[];
  hint: string;
}

export function splitChecks(text: string): string[] {
  return text
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

export function buildPreview(task: string, brief: string, checksText: string): PreviewResult {
  return {
    task,
    brief,
    checks: splitChecks(checksText),
    hint: "POST JSON to /submit from your client for real deployment",
  };
}

const router = Router();

// GET / - Manual preview form
router.get("/", (req, res) => {
  res.type("html").send(loadTemplate("preview.html"));
});

// POST /preview - Echo how a form entry would be submitted
router.post("/preview", (req, res) => {
  const { task, brief, checks } = req.body ?? {};

  if (typeof task !== "string" || typeof brief !== "string") {
    return res.status(400).json({ error: "task and brief are required" });
  }

  res.json(buildPreview(task, brief, typeof checks === "string" ? checks : ""));
});

export default router;
