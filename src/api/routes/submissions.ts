import { Request, Response, Router } from "express";
import { PublishError, ValidationError, errorMessage, statusForError } from "../../domain/errors";
import { parseSubmission } from "../../domain/submission";
import { BuildService } from "../../services/buildService";

interface ErrorBody {
  error: string;
  issues?: string[];
}

export function createSubmissionsRouter(buildService: BuildService): Router {
  const router = Router();

  async function handle(req: Request, res: Response): Promise<void> {
    try {
      const payload = parseSubmission(req.body);
      const outcome = await buildService.handle(payload);

      if (!outcome.notification.delivered) {
        console.error(`Evaluation notice for ${payload.task} was not delivered: ${outcome.notification.error}`);
      }
      res.json(outcome.response);
    } catch (error) {
      const status = statusForError(error);
      const body: ErrorBody = { error: status === 500 ? "Failed to build submission" : errorMessage(error) };
      if (error instanceof ValidationError && error.issues.length > 0) {
        body.issues = error.issues;
      }

      if (error instanceof PublishError) {
        const upstream = error.upstreamStatus ?? "none";
        console.error(`Publishing failed for ${req.path} (GitHub status ${upstream}): ${error.message}`);
      } else if (status >= 500) {
        console.error(`Error handling ${req.path}:`, error);
      } else {
        console.log(`Rejected ${req.path} (${status}): ${errorMessage(error)}`);
      }
      res.status(status).json(body);
    }
  }

  // POST /submit - Build and deploy round 1 (or any round)
  router.post("/submit", handle);

  // POST /revise - Same contract, used for round 2+
  router.post("/revise", handle);

  return router;
}
