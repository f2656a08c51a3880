import crypto from "crypto";
import { Publisher, RepositoryInfo } from "./githubPublisher";

interface StoredRepository {
  files: Map<string, Buffer>;
  headSha: string;
  commits: string[];
  pagesEnabled: boolean;
}

/**
 * InMemoryPublisher keeps repositories in process memory.
 * Use GitHubPublisher for real deployments.
 */
export class InMemoryPublisher implements Publisher {
  readonly repositories = new Map<string, StoredRepository>();
  private owner: string;

  constructor(owner: string = "octo-student") {
    this.owner = owner;
  }

  async ensureRepository(repoName: string): Promise<RepositoryInfo> {
    const htmlUrl = `https://github.com/${this.owner}/${repoName}`;
    if (this.repositories.has(repoName)) {
      return { name: repoName, htmlUrl, created: false };
    }
    this.repositories.set(repoName, { files: new Map(), headSha: "", commits: [], pagesEnabled: false });
    return { name: repoName, htmlUrl, created: true };
  }

  async readFile(repoName: string, filePath: string): Promise<string | null> {
    const file = this.repositories.get(repoName)?.files.get(filePath);
    return file ? file.toString("utf-8") : null;
  }

  async commitFiles(repoName: string, files: Map<string, Buffer>, message: string): Promise<string> {
    const repo = this.require(repoName);
    for (const [filePath, bytes] of files) {
      repo.files.set(filePath, bytes);
    }
    repo.headSha = crypto
      .createHash("sha1")
      .update(`${repo.headSha}\n${message}\n${repo.commits.length}`)
      .digest("hex");
    repo.commits.push(message);
    return repo.headSha;
  }

  async enablePages(repoName: string): Promise<string> {
    this.require(repoName).pagesEnabled = true;
    return `https://${this.owner}.github.io/${repoName}/`;
  }

  private require(repoName: string): StoredRepository {
    const repo = this.repositories.get(repoName);
    if (!repo) {
      throw new Error(`Repository ${repoName} does not exist`);
    }
    return repo;
  }
}
