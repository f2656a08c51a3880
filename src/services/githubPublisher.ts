import crypto from "crypto";
import axios, { AxiosInstance, AxiosRequestConfig, AxiosResponse } from "axios";
import { PublishError, errorMessage } from "../domain/errors";

export const GITHUB_API = "https://api.github.com";

export interface RepositoryInfo {
  name: string;
  htmlUrl: string;
  created: boolean;
}

/**
 * Where generated apps are pushed and served from.
 */
export interface Publisher {
  ensureRepository(repoName: string): Promise<RepositoryInfo>;
  /** Current contents of a file on the publishing branch, or null if missing. */
  readFile(repoName: string, filePath: string): Promise<string | null>;
  /** Write every file to the publishing branch and return the head commit SHA. */
  commitFiles(repoName: string, files: Map<string, Buffer>, message: string): Promise<string>;
  /** Turn on Pages for the repository and return its public URL. */
  enablePages(repoName: string): Promise<string>;
}

export type GitHubHttp = Pick<AxiosInstance, "get" | "post" | "put">;

export interface GitHubPublisherOptions {
  token: string;
  owner: string;
  branch?: string;
  timeoutMs?: number;
  http?: GitHubHttp;
}

interface GitHubRepository {
  html_url: string;
}

interface GitHubContent {
  sha: string;
  content?: string;
  encoding?: string;
}

interface GitHubRef {
  object: { sha: string };
}

interface GitHubPages {
  html_url?: string;
}

/**
 * SHA GitHub assigns to a blob with these bytes.
 */
export function gitBlobSha(content: Buffer): string {
  return crypto
    .createHash("sha1")
    .update(`blob ${content.length}\0`)
    .update(content)
    .digest("hex");
}

function contentPath(filePath: string): string {
  return filePath.split("/").map(encodeURIComponent).join("/");
}

function statusText(response: AxiosResponse): string {
  const data: unknown = response.data;
  if (data && typeof data === "object" && "message" in data && typeof data.message === "string") {
    return `${response.status} ${data.message}`;
  }
  return String(response.status);
}

/**
 * GitHubPublisher talks to the GitHub REST API with a personal access token.
 *
 * Files are written one at a time through the contents API, which creates
 * a commit per changed file. Unchanged files are skipped.
 */
export class GitHubPublisher implements Publisher {
  private token: string;
  private owner: string;
  private branch: string;
  private timeoutMs: number;
  private http: GitHubHttp;

  constructor(options: GitHubPublisherOptions) {
    this.token = options.token;
    this.owner = options.owner;
    this.branch = options.branch ?? "main";
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.http = options.http ?? axios;
  }

  async ensureRepository(repoName: string): Promise<RepositoryInfo> {
    const existing = await this.get<GitHubRepository>(this.repoUrl(repoName));
    if (existing.status === 200) {
      return { name: repoName, htmlUrl: existing.data.html_url, created: false };
    }
    if (existing.status !== 404) {
      throw new PublishError(`Could not look up repository ${repoName}: ${statusText(existing)}`, existing.status);
    }

    console.log(`[github] Creating repository ${this.owner}/${repoName}`);
    const created = await this.post<GitHubRepository>(`${GITHUB_API}/user/repos`, {
      name: repoName,
      private: false,
      auto_init: true,
    });
    if (created.status !== 201) {
      throw new PublishError(`Could not create repository ${repoName}: ${statusText(created)}`, created.status);
    }
    return { name: repoName, htmlUrl: created.data.html_url, created: true };
  }

  async readFile(repoName: string, filePath: string): Promise<string | null> {
    const content = await this.getContent(repoName, filePath);
    if (!content || content.content === undefined) {
      return null;
    }
    return Buffer.from(content.content, "base64").toString("utf-8");
  }

  async commitFiles(repoName: string, files: Map<string, Buffer>, message: string): Promise<string> {
    for (const [filePath, bytes] of files) {
      const current = await this.getContent(repoName, filePath);
      if (current && current.sha === gitBlobSha(bytes)) {
        continue;
      }

      const body: Record<string, string> = {
        message,
        content: bytes.toString("base64"),
        branch: this.branch,
      };
      if (current) {
        body.sha = current.sha;
      }

      const response = await this.put(`${this.repoUrl(repoName)}/contents/${contentPath(filePath)}`, body);
      if (response.status !== 200 && response.status !== 201) {
        throw new PublishError(`Could not write ${filePath} to ${repoName}: ${statusText(response)}`, response.status);
      }
    }

    const ref = await this.get<GitHubRef>(`${this.repoUrl(repoName)}/git/ref/heads/${this.branch}`);
    if (ref.status !== 200) {
      throw new PublishError(`Could not read ${this.branch} of ${repoName}: ${statusText(ref)}`, ref.status);
    }
    return ref.data.object.sha;
  }

  async enablePages(repoName: string): Promise<string> {
    const pagesUrl = `${this.repoUrl(repoName)}/pages`;
    const source = { source: { branch: this.branch, path: "/" } };

    const created = await this.post(pagesUrl, source);
    if (created.status !== 201 && created.status !== 204) {
      // Already enabled: point it at the branch root again.
      const updated = await this.put(pagesUrl, source);
      if (updated.status !== 204) {
        console.log(`[github] Pages update for ${repoName} returned ${statusText(updated)}`);
      }
    }

    const fallbackUrl = `https://${this.owner.toLowerCase()}.github.io/${repoName}/`;
    const pages = await this.get<GitHubPages>(pagesUrl);
    if (pages.status === 404) {
      console.log(`[github] Pages not reported yet for ${repoName}, assuming ${fallbackUrl}`);
      return fallbackUrl;
    }
    if (pages.status !== 200) {
      throw new PublishError(`Could not read Pages settings of ${repoName}: ${statusText(pages)}`, pages.status);
    }
    return pages.data.html_url || fallbackUrl;
  }

  private async getContent(repoName: string, filePath: string): Promise<GitHubContent | null> {
    const response = await this.get<GitHubContent>(`${this.repoUrl(repoName)}/contents/${contentPath(filePath)}`, {
      ref: this.branch,
    });
    if (response.status === 404) {
      return null;
    }
    if (response.status !== 200) {
      throw new PublishError(`Could not read ${filePath} from ${repoName}: ${statusText(response)}`, response.status);
    }
    return response.data;
  }

  private get<T>(url: string, params?: Record<string, string>): Promise<AxiosResponse<T>> {
    return this.send(`GET ${url}`, () => this.http.get<T>(url, { ...this.requestConfig(), params }));
  }

  private post<T>(url: string, body: object): Promise<AxiosResponse<T>> {
    return this.send(`POST ${url}`, () => this.http.post<T>(url, body, this.requestConfig()));
  }

  private put<T>(url: string, body: object): Promise<AxiosResponse<T>> {
    return this.send(`PUT ${url}`, () => this.http.put<T>(url, body, this.requestConfig()));
  }

  // Network failures and timeouts surface as PublishError like any non-2xx reply.
  private async send<T>(action: string, request: () => Promise<AxiosResponse<T>>): Promise<AxiosResponse<T>> {
    try {
      return await request();
    } catch (error) {
      throw new PublishError(`${action} failed: ${errorMessage(error)}`);
    }
  }

  private repoUrl(repoName: string): string {
    return `${GITHUB_API}/repos/${this.owner}/${repoName}`;
  }

  private requestConfig(): AxiosRequestConfig {
    return {
      headers: {
        Authorization: `Bearer ${this.token}`,
        Accept: "application/vnd.github+json",
        "X-GitHub-Api-Version": "2022-11-28",
      },
      timeout: this.timeoutMs,
      validateStatus: () => true,
    };
  }
}
