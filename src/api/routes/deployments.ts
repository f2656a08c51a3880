import { Router } from "express";
import { Services } from "../../services";

export function createDeploymentsRouter({ buildService, store }: Services): Router {
  const router = Router();

  // GET /deployments - All deployments, most recently updated first
  router.get("/", (req, res) => {
    try {
      res.json(store.getAll());
    } catch (error) {
      console.error("Error fetching deployments:", error);
      res.status(500).json({ error: "Failed to fetch deployments" });
    }
  });

  // GET /deployments/:task - Deployment for one task
  router.get("/:task", (req, res) => {
    try {
      const record = buildService.findDeployment(req.params.task);
      if (!record) {
        return res.status(404).json({ error: "Deployment not found" });
      }
      res.json(record);
    } catch (error) {
      console.error("Error fetching deployment:", error);
      res.status(500).json({ error: "Failed to fetch deployment" });
    }
  });

  return router;
}
