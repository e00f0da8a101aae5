// IPullRequestHost over the GitHub REST API.

import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import { ConfigError, VersionControlError } from "../domain/errors.ts";
import type { IPullRequestHost, PullRequestRef } from "../ports/ports.ts";
import type { GitHubCfg } from "../utils/types.ts";
import { explainAxios } from "./http-errors.ts";

export const GITHUB_API_URL = "https://api.github.com";

const RepositorySchema = z.object({ default_branch: z.string() });
const PullRequestSchema = z.object({ html_url: z.string(), number: z.number() });

function toRef(data: unknown): PullRequestRef {
  const pr = PullRequestSchema.parse(data);
  return { url: pr.html_url, number: pr.number };
}

export function splitRepository(repository: string): { owner: string; repo: string } {
  const [owner, repo, ...rest] = repository.split("/");
  if (!owner || !repo || rest.length > 0) {
    throw new ConfigError(`Repository must look like "owner/name", got ${JSON.stringify(repository)}`, {
      field: "repository",
    });
  }
  return { owner, repo };
}

export class GitHubPullRequests implements IPullRequestHost {
  private readonly ax: AxiosInstance;
  private readonly owner: string;
  private readonly repo: string;

  constructor(cfg: GitHubCfg, ax?: AxiosInstance) {
    const { owner, repo } = splitRepository(cfg.repository);
    this.owner = owner;
    this.repo = repo;
    this.ax = ax ??
      axios.create({
        baseURL: cfg.apiUrl ?? GITHUB_API_URL,
        headers: {
          Authorization: `Bearer ${cfg.token}`,
          Accept: "application/vnd.github+json",
        },
      });
  }

  private get base(): string {
    return `/repos/${encodeURIComponent(this.owner)}/${encodeURIComponent(this.repo)}`;
  }

  async defaultBranch(): Promise<string> {
    try {
      const res = await this.ax.get<unknown>(this.base);
      return RepositorySchema.parse(res.data).default_branch;
    } catch (err) {
      throw new VersionControlError(explainAxios(err, "Failed to read repository metadata").message, {
        cause: err,
      });
    }
  }

  async findOpen(head: string): Promise<PullRequestRef | null> {
    try {
      const res = await this.ax.get<unknown>(`${this.base}/pulls`, {
        params: { state: "open", head: `${this.owner}:${head}` },
      });
      const list = z.array(z.unknown()).parse(res.data);
      return list.length > 0 ? toRef(list[0]) : null;
    } catch (err) {
      throw new VersionControlError(explainAxios(err, "Failed to list pull requests").message, {
        cause: err,
      });
    }
  }

  async open(req: { head: string; base: string; title: string; body: string }): Promise<PullRequestRef> {
    try {
      const res = await this.ax.post<unknown>(`${this.base}/pulls`, req);
      return toRef(res.data);
    } catch (err) {
      throw new VersionControlError(explainAxios(err, "Failed to open pull request").message, {
        cause: err,
      });
    }
  }

  async close(pr: PullRequestRef): Promise<void> {
    try {
      await this.ax.patch(`${this.base}/pulls/${pr.number}`, { state: "closed" });
    } catch (err) {
      throw new VersionControlError(explainAxios(err, `Failed to close pull request ${pr.url}`).message, {
        cause: err,
      });
    }
  }
}
