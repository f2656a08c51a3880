import fs from "fs";
import path from "path";
import { DeployResult, DeploymentRecord } from "../domain/deployment";

export interface RecordRoundInput {
  task: string;
  round: number;
  nonce: string;
  deploy: DeployResult;
  deployedAt: Date;
}

/**
 * DeploymentStore keeps one JSON file per repository: {dataDir}/deployments/{repoName}.json
 *
 * A task always maps to the same repository, so later rounds update the
 * existing record instead of adding a new one. Tasks whose names map to the
 * same repository share a record.
 */
export class DeploymentStore {
  private dir: string;

  constructor(dataDir: string) {
    this.dir = path.join(dataDir, "deployments");
    if (!fs.existsSync(this.dir)) {
      fs.mkdirSync(this.dir, { recursive: true });
    }
  }

  /**
   * Load the deployment for a repository. An unreadable file counts as missing
   * and is replaced by the next recorded round.
   */
  load(repoName: string): DeploymentRecord | null {
    const filePath = this.filePath(repoName);
    if (!fs.existsSync(filePath)) {
      return null;
    }
    try {
      const data = fs.readFileSync(filePath, "utf-8");
      return JSON.parse(data) as DeploymentRecord;
    } catch (error) {
      console.error(`[store] Ignoring unreadable deployment file ${repoName}.json:`, error);
      return null;
    }
  }

  /**
   * Add a round to a task's deployment, creating the record on first use.
   * A retried round with the same nonce replaces its earlier entry.
   */
  recordRound(input: RecordRoundInput): DeploymentRecord {
    const { deploy } = input;
    const timestamp = input.deployedAt.toISOString();
    const existing = this.load(deploy.repoName);

    const record: DeploymentRecord = {
      task: input.task,
      repoName: deploy.repoName,
      repoUrl: deploy.repoUrl,
      pagesUrl: deploy.pagesUrl,
      commitSha: deploy.commitSha,
      rounds: [
        ...(existing?.rounds ?? []).filter((r) => r.round !== input.round || r.nonce !== input.nonce),
        { round: input.round, nonce: input.nonce, commitSha: deploy.commitSha, deployedAt: timestamp },
      ],
      createdAt: existing?.createdAt ?? timestamp,
      updatedAt: timestamp,
    };

    this.save(record);
    return record;
  }

  save(record: DeploymentRecord): void {
    const filePath = this.filePath(record.repoName);
    const tmpPath = `${filePath}.tmp`;
    fs.writeFileSync(tmpPath, JSON.stringify(record, null, 2));
    fs.renameSync(tmpPath, filePath);
  }

  getAll(): DeploymentRecord[] {
    if (!fs.existsSync(this.dir)) {
      return [];
    }

    const records: DeploymentRecord[] = [];
    for (const file of fs.readdirSync(this.dir).filter((f) => f.endsWith(".json"))) {
      try {
        const data = fs.readFileSync(path.join(this.dir, file), "utf-8");
        records.push(JSON.parse(data) as DeploymentRecord);
      } catch (error) {
        console.error(`[store] Skipping unreadable deployment file ${file}:`, error);
      }
    }

    return records.sort(
      (a, b) => new Date(b.updatedAt).getTime() - new Date(a.updatedAt).getTime()
    );
  }

  private filePath(repoName: string): string {
    return path.join(this.dir, `${repoName}.json`);
  }
}
