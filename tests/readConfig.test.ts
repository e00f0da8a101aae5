import { afterEach, beforeEach, describe, it } from "node:test";
import assert from "node:assert/strict";
import { NodeFileSystem } from "../lib/adapters/node-file-system.ts";
import { ConfigError } from "../lib/domain/errors.ts";
import { normalizeHost, readProjectConfig, resolveConfig } from "../lib/utils/readConfig.ts";
import type { Path } from "../lib/utils/types.ts";
import { makeTempDir, writeFiles } from "./helpers/fakes.ts";

const SERVER_ENV: Record<string, string> = {
  DISCOURSE_HOST: "discourse.example.test",
  DISCOURSE_API_USERNAME: "docs-bot",
  DISCOURSE_API_KEY: "test-secret",
};

function envOf(vars: Record<string, string>) {
  return (key: string): string | undefined => vars[key];
}

describe("resolveConfig", () => {
  it("applies defaults", () => {
    const config = resolveConfig({}, envOf(SERVER_ENV), {}, "/work");

    assert.equal(config.basePath, "/work");
    assert.equal(config.docsDir, "docs");
    assert.equal(config.dryRun, false);
    assert.equal(config.deleteTopics, true);
    assert.equal(config.categoryId, 41);
    assert.equal(config.branchName, "doctree-sync/migrate");
    assert.equal(config.indexUrl, undefined);
    assert.equal(config.github, undefined);
    assert.deepEqual(config.discourse, {
      baseUrl: "https://discourse.example.test",
      apiUsername: "docs-bot",
      apiKey: "test-secret",
    });
  });

  it("prefers flags over the environment over the project file", () => {
    const config = resolveConfig(
      { basePath: "repo", docsDir: "documentation", categoryId: "7", dryRun: true, deleteTopics: false },
      envOf({ ...SERVER_ENV, DISCOURSE_CATEGORY_ID: "9", DRY_RUN: "false" }),
      { categoryId: 5, docsDir: "manual", indexUrl: "https://discourse.example.test/t/docs/1", name: "Handbook" },
      "/work",
    );

    assert.equal(config.basePath, "/work/repo");
    assert.equal(config.docsDir, "documentation");
    assert.equal(config.categoryId, 7);
    assert.equal(config.dryRun, true);
    assert.equal(config.deleteTopics, false);
    assert.equal(config.indexUrl, "https://discourse.example.test/t/docs/1");
    assert.equal(config.rootTitle, "Handbook");
  });

  it("reads switches and repository access from the environment", () => {
    const config = resolveConfig(
      {},
      envOf({
        ...SERVER_ENV,
        DISCOURSE_CATEGORY_ID: "9",
        DELETE_TOPICS: "false",
        DRY_RUN: "yes",
        GITHUB_TOKEN: "test-token",
        GITHUB_REPOSITORY: "octo/docs",
      }),
      { categoryId: 5 },
      "/work",
    );

    assert.equal(config.categoryId, 9);
    assert.equal(config.deleteTopics, false);
    assert.equal(config.dryRun, true);
    assert.deepEqual(config.github, { token: "test-token", repository: "octo/docs" });
  });

  it("requires the server connection", () => {
    assert.throws(() => resolveConfig({}, envOf({}), {}, "/work"), (err: unknown) => {
      assert.ok(err instanceof ConfigError);
      assert.match(err.message, /discourse\.baseUrl/);
      assert.match(err.message, /discourse\.apiKey/);
      return true;
    });
  });

  it("rejects malformed values", () => {
    assert.throws(
      () => resolveConfig({ categoryId: "abc" }, envOf(SERVER_ENV), {}, "/work"),
      /Expected a positive integer, got "abc" \(field: categoryId\)/,
    );
    assert.throws(
      () => resolveConfig({}, envOf({ ...SERVER_ENV, DELETE_TOPICS: "maybe" }), {}, "/work"),
      /Expected a boolean, got "maybe" \(field: DELETE_TOPICS\)/,
    );
    assert.throws(
      () => resolveConfig({ githubToken: "test-token", repository: "octo" }, envOf(SERVER_ENV), {}, "/work"),
      /github\.repository: expected owner\/name/,
    );
  });

  it("normalizes the host into a base URL", () => {
    assert.equal(normalizeHost("discourse.example.test"), "https://discourse.example.test");
    assert.equal(normalizeHost("http://localhost:3000/"), "http://localhost:3000");
  });
});

describe("readProjectConfig", () => {
  const fs = new NodeFileSystem();
  let dir: Path;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    ({ dir, cleanup } = await makeTempDir());
  });

  afterEach(async () => {
    await cleanup();
  });

  it("is empty without a project file", async () => {
    assert.deepEqual(await readProjectConfig(fs, dir), {});
  });

  it("reads the project file", async () => {
    await writeFiles(dir, {
      "doctree-sync.config.json": JSON.stringify({ indexUrl: "https://discourse.example.test/t/docs/1", categoryId: 12 }),
    });
    assert.deepEqual(await readProjectConfig(fs, dir), {
      indexUrl: "https://discourse.example.test/t/docs/1",
      categoryId: 12,
    });
  });

  it("rejects invalid JSON", async () => {
    await writeFiles(dir, { "doctree-sync.config.json": "{ nope" });
    await assert.rejects(readProjectConfig(fs, dir), /doctree-sync.config.json is not valid JSON/);
  });

  it("rejects unknown settings", async () => {
    await writeFiles(dir, { "doctree-sync.config.json": JSON.stringify({ indexURL: "x" }) });
    await assert.rejects(readProjectConfig(fs, dir), ConfigError);
  });
});
