import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { makeFingerprint } from "../lib/domain/entities.ts";
import { RemoteUnavailableError } from "../lib/domain/errors.ts";
import { composeIndexDocument } from "../lib/navigation/navigation-table.ts";
import { buildRemoteTree, emptyRemoteTree } from "../lib/tree/remote-tree.ts";
import { preorder } from "../lib/tree/tree-utils.ts";
import { asRemoteUrl } from "../lib/utils/types.ts";
import { FAKE_HOST, FakeDocumentServer, RecordingNotifier } from "./helpers/fakes.ts";
import { group, page, root } from "./helpers/trees.ts";

describe("buildRemoteTree", () => {
  it("decodes the table and fetches every referenced page", async () => {
    const server = new FakeDocumentServer();
    const a = server.seed("A", "alpha");
    const b = server.seed("B", "beta");
    const source = composeIndexDocument(
      "# Docs\n\nWelcome",
      root([page("a", null, { title: "A", remoteId: a }), group("g", [page("g/b", null, { title: "B", remoteId: b })])]),
    );
    const indexUrl = server.seed("Docs", source);

    const remote = await buildRemoteTree(server, indexUrl, { rootTitle: "Docs" });

    assert.deepEqual(preorder(remote.root).map((n) => [n.path, n.kind, n.remoteId]), [
      ["a", "page", a],
      ["g", "group", undefined],
      ["g/b", "page", b],
    ]);
    const pageB = preorder(remote.root)[2];
    assert.ok(pageB.kind === "page");
    assert.equal(pageB.content, "beta");
    assert.equal(pageB.fingerprint, makeFingerprint("beta"));
    assert.equal(remote.index.remoteId, indexUrl);
    assert.equal(remote.index.content, "# Docs\n\nWelcome\n");
    assert.equal(remote.source, source);
    assert.deepEqual(server.calls, [`get ${indexUrl}`, `get ${a}`, `get ${b}`]);
  });

  it("leaves content unknown when a page cannot be read", async () => {
    const server = new FakeDocumentServer();
    const gone = `${FAKE_HOST}/t/gone/99`;
    const indexUrl = server.seed(
      "Docs",
      composeIndexDocument("", root([page("gone", null, { title: "Gone", remoteId: gone })])),
    );
    const notifier = new RecordingNotifier();

    const remote = await buildRemoteTree(server, indexUrl, { notifier });

    const [node] = preorder(remote.root);
    assert.ok(node.kind === "page");
    assert.equal(node.content, null);
    assert.equal(node.fingerprint, null);
    assert.equal(
      notifier.lines[0],
      `warn: Content of ${gone} could not be retrieved, treating it as changed: Document not found: ${gone}`,
    );
  });

  it("does not fetch pages that were never created", async () => {
    const server = new FakeDocumentServer();
    const indexUrl = server.seed("Docs", composeIndexDocument("", root([page("draft", null, { title: "Draft" })])));

    const remote = await buildRemoteTree(server, indexUrl);

    assert.deepEqual(server.calls, [`get ${indexUrl}`]);
    assert.equal(preorder(remote.root)[0].remoteId, undefined);
  });

  it("fails when the index document is unavailable", async () => {
    const server = new FakeDocumentServer();
    await assert.rejects(
      buildRemoteTree(server, asRemoteUrl(`${FAKE_HOST}/t/missing/1`)),
      RemoteUnavailableError,
    );
  });

  it("is empty without an index document", async () => {
    const server = new FakeDocumentServer();
    assert.deepEqual(await buildRemoteTree(server, undefined, { rootTitle: "Handbook" }), emptyRemoteTree("Handbook"));
    assert.deepEqual(server.calls, []);
  });
});
