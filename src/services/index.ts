/**
 * Services Index
 *
 * Export all services and wire them from configuration.
 */

import { AppConfig } from "../config";
import { AppGenerator } from "../domain/appGenerator";
import { AttachmentDecoder } from "../domain/attachments";
import { LLMAppGenerator } from "../domain/llmAppGenerator";
import { TemplateAppGenerator } from "../domain/templateAppGenerator";
import { DeploymentStore } from "../stores/deploymentStore";
import { BuildService } from "./buildService";
import { GitHubPublisher } from "./githubPublisher";
import { EvaluationNotifier } from "./notifier";

export { BuildService } from "./buildService";
export type { BuildOutcome, BuildServiceDeps, StudentCredentials } from "./buildService";
export { GitHubPublisher } from "./githubPublisher";
export type { Publisher, RepositoryInfo } from "./githubPublisher";
export { EvaluationNotifier } from "./notifier";
export type { Notifier, NotificationOutcome } from "./notifier";

export interface Services {
  buildService: BuildService;
  store: DeploymentStore;
}

// Pick the generator based on API key availability
export function createGenerator(config: AppConfig): AppGenerator {
  if (config.openaiApiKey) {
    return new LLMAppGenerator(config.openaiApiKey, {
      model: config.openaiModel,
      timeoutMs: config.httpTimeoutMs * 3,
    });
  }
  console.log("No OPENAI_API_KEY found, using TemplateAppGenerator");
  return new TemplateAppGenerator();
}

export function createServices(config: AppConfig): Services {
  const store = new DeploymentStore(config.dataDir);
  const buildService = new BuildService({
    credentials: { email: config.studentEmail, secret: config.studentSecret },
    repoPrefix: config.repoPrefix,
    generator: createGenerator(config),
    publisher: new GitHubPublisher({
      token: config.githubToken,
      owner: config.githubUsername,
      timeoutMs: config.httpTimeoutMs,
    }),
    store,
    notifier: new EvaluationNotifier({
      timeoutMs: config.httpTimeoutMs,
      maxAttempts: config.notifyRetries,
    }),
    attachments: new AttachmentDecoder({ timeoutMs: config.httpTimeoutMs }),
  });

  return { buildService, store };
}
