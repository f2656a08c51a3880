/**
 * Outcome of pushing a generated app to GitHub Pages.
 */
export interface DeployResult {
  repoName: string;
  repoUrl: string;
  pagesUrl: string;
  commitSha: string;
}

export interface DeploymentRound {
  round: number;
  nonce: string;
  commitSha: string;
  deployedAt: string;
}

/**
 * One deployment per task. Later rounds update it in place.
 */
export interface DeploymentRecord {
  task: string;
  repoName: string;
  repoUrl: string;
  pagesUrl: string;
  commitSha: string;
  rounds: DeploymentRound[];
  createdAt: string;
  updatedAt: string;
}

/**
 * Repository name for a task: the prefix followed by the task id with
 * anything GitHub would reject replaced by "-".
 */
export function repoNameForTask(prefix: string, task: string): string {
  return `${prefix}${task.trim()}`.replace(/[^A-Za-z0-9._-]/g, "-");
}

export function commitMessageFor(task: string, round: number): string {
  return `${round > 1 ? "revise" : "initial"}: ${task}`;
}
