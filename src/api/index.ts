import dotenv from "dotenv";

import { loadConfig } from "../config";
import { createServices } from "../services";
import { createApp } from "./app";

dotenv.config();

const config = loadConfig();
const app = createApp(createServices(config));

// Start server
app.listen(config.port, () => {
  console.log(`API server running on http://localhost:${config.port}`);
  console.log(`Publishing to github.com/${config.githubUsername} with prefix "${config.repoPrefix}"`);
});

export default app;
