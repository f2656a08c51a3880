import { Router } from "express";

const SERVICE_NAME = "app-brief-deployer";

const router = Router();

// GET /healthz - Liveness probe
router.get("/healthz", (req, res) => {
  res.json({ ok: true, service: SERVICE_NAME });
});

export default router;
