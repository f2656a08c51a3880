/**
 * Build Service - brief in, GitHub Pages site out.
 *
 * Handles a submission end to end:
 * - checks the student's credentials
 * - decodes attachments
 * - generates the site (revising the deployed one on later rounds)
 * - commits it and enables Pages
 * - records the round and notifies the evaluation URL
 */

import crypto from "crypto";
import { AppGenerator, ExistingSite } from "../domain/appGenerator";
import { AttachmentDecoder } from "../domain/attachments";
import { DeployResult, DeploymentRecord, commitMessageFor, repoNameForTask } from "../domain/deployment";
import { AuthenticationError } from "../domain/errors";
import { EvaluationNotice, SubmissionRequest, SubmissionResponse } from "../domain/submission";
import { DeploymentStore } from "../stores/deploymentStore";
import { Publisher } from "./githubPublisher";
import { NotificationOutcome, Notifier } from "./notifier";

export interface StudentCredentials {
  email: string;
  secret: string;
}

export interface BuildServiceDeps {
  credentials: StudentCredentials;
  repoPrefix: string;
  generator: AppGenerator;
  publisher: Publisher;
  store: DeploymentStore;
  notifier: Notifier;
  attachments: AttachmentDecoder;
  now?: () => Date;
}

export interface BuildOutcome {
  response: SubmissionResponse;
  deploy: DeployResult;
  notification: NotificationOutcome;
  latencyMs: number;
}

function digest(value: string): Buffer {
  return crypto.createHash("sha256").update(value, "utf-8").digest();
}

function safeEqual(a: string, b: string): boolean {
  return crypto.timingSafeEqual(digest(a), digest(b));
}

export class BuildService {
  private deps: BuildServiceDeps;
  private now: () => Date;

  constructor(deps: BuildServiceDeps) {
    this.deps = deps;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Throws AuthenticationError unless email and secret both match.
   */
  authenticate(payload: Pick<SubmissionRequest, "email" | "secret">): void {
    const { credentials } = this.deps;
    const emailOk = safeEqual(payload.email, credentials.email);
    const secretOk = safeEqual(payload.secret, credentials.secret);
    if (!emailOk || !secretOk) {
      throw new AuthenticationError();
    }
  }

  /**
   * Deployment record of the repository a task publishes to, if any.
   */
  findDeployment(task: string): DeploymentRecord | null {
    return this.deps.store.load(repoNameForTask(this.deps.repoPrefix, task));
  }

  async handle(payload: SubmissionRequest): Promise<BuildOutcome> {
    const startedAt = this.now().getTime();
    this.authenticate(payload);

    const deploy = await this.deploy(payload);
    const latencyMs = this.now().getTime() - startedAt;

    const response: SubmissionResponse = {
      email: payload.email,
      task: payload.task,
      round: payload.round,
      nonce: payload.nonce,
      repo_url: deploy.repoUrl,
      commit_sha: deploy.commitSha,
      pages_url: deploy.pagesUrl,
    };
    const notice: EvaluationNotice = { ...response, latency_ms: latencyMs };
    const notification = await this.deps.notifier.notify(payload.evaluation_url, notice);

    return { response, deploy, notification, latencyMs };
  }

  /**
   * Build and publish the site for a submission and record the round.
   * Every round of a task goes to the same repository.
   */
  async deploy(payload: SubmissionRequest): Promise<DeployResult> {
    const { publisher, generator, store } = this.deps;
    const repoName = repoNameForTask(this.deps.repoPrefix, payload.task);

    const attachmentFiles = await this.deps.attachments.decodeAll(payload.attachments);
    const repository = await publisher.ensureRepository(repoName);

    const previous = store.load(repoName);
    if (payload.round > 1 && !previous && repository.created) {
      console.log(`[build] Round ${payload.round} for ${payload.task} has no earlier deployment`);
    }

    let existing: ExistingSite | undefined;
    if (payload.round > 1 && !repository.created) {
      existing = {
        indexHtml: await publisher.readFile(repoName, "index.html"),
        scriptJs: await publisher.readFile(repoName, "script.js"),
      };
    }

    const site = await generator.generate({
      task: payload.task,
      round: payload.round,
      brief: payload.brief,
      checks: payload.checks,
      attachments: [...attachmentFiles.keys()],
      existing,
    });
    console.log(`[build] Generated ${Object.keys(site.files).length} files for ${payload.task} (${site.source})`);

    const files = new Map<string, Buffer>();
    for (const [filePath, text] of Object.entries(site.files)) {
      files.set(filePath, Buffer.from(text, "utf-8"));
    }
    for (const [filePath, bytes] of attachmentFiles) {
      files.set(filePath, bytes);
    }

    const commitSha = await publisher.commitFiles(repoName, files, commitMessageFor(payload.task, payload.round));
    const pagesUrl = await publisher.enablePages(repoName);

    const deploy: DeployResult = { repoName, repoUrl: repository.htmlUrl, pagesUrl, commitSha };
    const record = store.recordRound({
      task: payload.task,
      round: payload.round,
      nonce: payload.nonce,
      deploy,
      deployedAt: this.now(),
    });
    console.log(
      `[build] ${previous ? "Updated" : "Created"} deployment ${repoName} at ${commitSha} (${record.rounds.length} round(s))`
    );

    return deploy;
  }
}
