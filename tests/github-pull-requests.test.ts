import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { GitHubPullRequests, splitRepository } from "../lib/adapters/github-pull-requests.ts";
import { ConfigError, VersionControlError } from "../lib/domain/errors.ts";
import { createMockAxios } from "./helpers/mock-axios.ts";

const cfg = { token: "test-token", repository: "octo/docs" };
const API = "https://api.github.example.test";

describe("GitHubPullRequests", () => {
  it("reads the default branch", async () => {
    const { ax } = createMockAxios({ "GET /repos/octo/docs": { status: 200, data: { default_branch: "trunk" } } }, API);
    assert.equal(await new GitHubPullRequests(cfg, ax).defaultBranch(), "trunk");
  });

  it("looks up open pull requests by owner-qualified head", async () => {
    const { ax, requests } = createMockAxios(
      {
        "GET /repos/octo/docs/pulls": {
          status: 200,
          data: [{ html_url: "https://github.example.test/octo/docs/pull/5", number: 5, state: "open" }],
        },
      },
      API,
    );

    const found = await new GitHubPullRequests(cfg, ax).findOpen("doctree-sync/migrate");

    assert.deepEqual(found, { url: "https://github.example.test/octo/docs/pull/5", number: 5 });
    assert.deepEqual(requests[0].params, { state: "open", head: "octo:doctree-sync/migrate" });
  });

  it("returns null when no pull request is open", async () => {
    const { ax } = createMockAxios({ "GET /repos/octo/docs/pulls": { status: 200, data: [] } }, API);
    assert.equal(await new GitHubPullRequests(cfg, ax).findOpen("doctree-sync/migrate"), null);
  });

  it("opens a pull request", async () => {
    const { ax, requests } = createMockAxios(
      {
        "POST /repos/octo/docs/pulls": {
          status: 201,
          data: { html_url: "https://github.example.test/octo/docs/pull/6", number: 6 },
        },
      },
      API,
    );
    const req = { head: "doctree-sync/migrate", base: "main", title: "Migrate", body: "Body" };

    const pr = await new GitHubPullRequests(cfg, ax).open(req);

    assert.deepEqual(pr, { url: "https://github.example.test/octo/docs/pull/6", number: 6 });
    assert.deepEqual(requests[0].body, req);
  });

  it("closes a pull request", async () => {
    const { ax, requests } = createMockAxios(
      { "PATCH /repos/octo/docs/pulls/6": { status: 200, data: { number: 6, state: "closed" } } },
      API,
    );

    await new GitHubPullRequests(cfg, ax).close({ url: "https://github.example.test/octo/docs/pull/6", number: 6 });

    assert.deepEqual(requests.map((r) => [r.route, r.body]), [["PATCH /repos/octo/docs/pulls/6", { state: "closed" }]]);
  });

  it("wraps API failures", async () => {
    const { ax } = createMockAxios(
      { "POST /repos/octo/docs/pulls": { status: 422, data: { message: "Validation Failed" } } },
      API,
    );

    await assert.rejects(
      new GitHubPullRequests(cfg, ax).open({ head: "x", base: "main", title: "t", body: "b" }),
      (err: unknown) => {
        assert.ok(err instanceof VersionControlError);
        assert.equal(err.message, "Failed to open pull request: Validation Failed (HTTP 422)");
        return true;
      },
    );
  });

  it("rejects a repository that is not owner/name", () => {
    assert.deepEqual(splitRepository("octo/docs"), { owner: "octo", repo: "docs" });
    assert.throws(() => splitRepository("octo"), ConfigError);
    assert.throws(() => splitRepository("octo/docs/extra"), ConfigError);
  });
});
