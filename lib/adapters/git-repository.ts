// IGitRepository over the git CLI. The command runner is injectable so
// tests never spawn git.

import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { VersionControlError } from "../domain/errors.ts";
import type { IGitRepository } from "../ports/ports.ts";
import type { Path } from "../utils/types.ts";

/** Command runner result */
export interface RunResult {
  code: number;
  stdout: string;
  stderr: string;
}

/** Command runner signature */
export type CommandRunner = (cmd: string[], opts: { cwd: string }) => Promise<RunResult>;

const execFileAsync = promisify(execFile);

function isExecError(err: unknown): err is Error & { code?: number | string; stdout?: string; stderr?: string } {
  return err instanceof Error;
}

export const defaultRunner: CommandRunner = async (cmd, opts) => {
  try {
    const { stdout, stderr } = await execFileAsync(cmd[0], cmd.slice(1), { cwd: opts.cwd, encoding: "utf8" });
    return { code: 0, stdout, stderr };
  } catch (err) {
    if (isExecError(err) && typeof err.code === "number") {
      return { code: err.code, stdout: err.stdout ?? "", stderr: err.stderr ?? "" };
    }
    throw err;
  }
};

export interface GitIdentity {
  name: string;
  email: string;
}

export const DEFAULT_IDENTITY: GitIdentity = {
  name: "doctree-sync",
  email: "doctree-sync@users.noreply.github.com",
};

export class GitCliRepository implements IGitRepository {
  readonly cwd: Path;
  private readonly runner: CommandRunner;
  private readonly identity: GitIdentity;
  private readonly remote: string;

  constructor(
    cwd: Path,
    options: { runner?: CommandRunner; identity?: GitIdentity; remote?: string } = {},
  ) {
    this.cwd = cwd;
    this.runner = options.runner ?? defaultRunner;
    this.identity = options.identity ?? DEFAULT_IDENTITY;
    this.remote = options.remote ?? "origin";
  }

  at(cwd: Path): IGitRepository {
    return new GitCliRepository(cwd, { runner: this.runner, identity: this.identity, remote: this.remote });
  }

  private async git(...args: string[]): Promise<string> {
    const res = await this.runner(["git", ...args], { cwd: this.cwd });
    if (res.code !== 0) {
      throw new VersionControlError(
        `git ${args.join(" ")} failed (exit ${res.code}): ${res.stderr.trim() || res.stdout.trim()}`,
      );
    }
    return res.stdout;
  }

  async switchToNewBranch(branch: string, base: string): Promise<void> {
    // Start from the remote tip so a detached HEAD checkout does not matter.
    await this.git("fetch", this.remote, base);
    await this.git("checkout", "-B", branch, `${this.remote}/${base}`);
  }

  async commit(message: string, paths: readonly string[]): Promise<boolean> {
    await this.git("add", "--all", "--", ...paths);
    const staged = await this.git("diff", "--cached", "--name-only");
    if (!staged.trim()) return false;
    await this.git(
      "-c",
      `user.name=${this.identity.name}`,
      "-c",
      `user.email=${this.identity.email}`,
      "commit",
      "-m",
      message,
    );
    return true;
  }

  async push(branch: string): Promise<void> {
    await this.git("push", "--force", this.remote, `${branch}:${branch}`);
  }
}
