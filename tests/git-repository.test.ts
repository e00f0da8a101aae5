import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { GitCliRepository, type CommandRunner, type RunResult } from "../lib/adapters/git-repository.ts";
import { VersionControlError } from "../lib/domain/errors.ts";
import { asPath } from "../lib/utils/types.ts";

function recordingRunner(results: Record<string, Partial<RunResult>> = {}) {
  const calls: string[] = [];
  const runner: CommandRunner = async (cmd, opts) => {
    const line = cmd.join(" ");
    calls.push(`${opts.cwd}$ ${line}`);
    return { code: 0, stdout: "", stderr: "", ...results[line] };
  };
  return { calls, runner };
}

describe("GitCliRepository", () => {
  it("cuts the branch from the remote tip of the base", async () => {
    const { calls, runner } = recordingRunner();
    await new GitCliRepository(asPath("/repo"), { runner }).switchToNewBranch("doctree-sync/migrate", "main");
    assert.deepEqual(calls, [
      "/repo$ git fetch origin main",
      "/repo$ git checkout -B doctree-sync/migrate origin/main",
    ]);
  });

  it("commits staged changes with the bot identity", async () => {
    const { calls, runner } = recordingRunner({ "git diff --cached --name-only": { stdout: "docs/a.md\n" } });

    const committed = await new GitCliRepository(asPath("/repo"), { runner }).commit("Sync docs", ["docs"]);

    assert.equal(committed, true);
    assert.deepEqual(calls, [
      "/repo$ git add --all -- docs",
      "/repo$ git diff --cached --name-only",
      "/repo$ git -c user.name=doctree-sync -c user.email=doctree-sync@users.noreply.github.com commit -m Sync docs",
    ]);
  });

  it("does not commit when nothing is staged", async () => {
    const { calls, runner } = recordingRunner();
    assert.equal(await new GitCliRepository(asPath("/repo"), { runner }).commit("Sync docs", ["docs"]), false);
    assert.equal(calls.length, 2);
  });

  it("runs in another working tree through at()", async () => {
    const { calls, runner } = recordingRunner();
    await new GitCliRepository(asPath("/repo"), { runner }).at(asPath("/tmp/copy")).push("doctree-sync/migrate");
    assert.deepEqual(calls, ["/tmp/copy$ git push --force origin doctree-sync/migrate:doctree-sync/migrate"]);
  });

  it("reports a failing command", async () => {
    const { runner } = recordingRunner({ "git push --force origin b:b": { code: 1, stderr: "rejected\n" } });
    await assert.rejects(
      new GitCliRepository(asPath("/repo"), { runner }).push("b"),
      (err: unknown) => {
        assert.ok(err instanceof VersionControlError);
        assert.equal(err.message, "git push --force origin b:b failed (exit 1): rejected");
        return true;
      },
    );
  });
});
