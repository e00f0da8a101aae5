import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { countNodes, graft, parentDocPath, postorder, preorder, withRemoteIds } from "../lib/tree/tree-utils.ts";
import { asDocPath, asRemoteUrl } from "../lib/utils/types.ts";
import { group, page, root, tree } from "./helpers/trees.ts";

const sample = root([group("g", [page("g/a", "a"), group("g/h", [page("g/h/b", "b")])]), page("c", "c")]);

describe("tree traversal", () => {
  it("walks parents first in pre-order", () => {
    assert.deepEqual(preorder(sample).map((n) => n.path), ["g", "g/a", "g/h", "g/h/b", "c"]);
  });

  it("walks children first in post-order", () => {
    assert.deepEqual(postorder(sample).map((n) => n.path), ["g/a", "g/h/b", "g/h", "g", "c"]);
  });

  it("counts groups and pages without the root", () => {
    assert.deepEqual(countNodes(tree(sample.children)), { groups: 2, pages: 3 });
  });

  it("finds the parent path", () => {
    assert.equal(parentDocPath(asDocPath("g/h/b")), "g/h");
    assert.equal(parentDocPath(asDocPath("c")), "");
  });
});

describe("tree rebuilding", () => {
  it("assigns remote ids to pages by case-insensitive path", () => {
    const linked = withRemoteIds(sample, new Map([["g/h/b", asRemoteUrl("/t/b/1")], ["g", asRemoteUrl("/t/g/2")]]));
    const byPath = new Map(preorder(linked).map((n) => [n.path, n.remoteId]));
    assert.equal(byPath.get(asDocPath("g/h/b")), "/t/b/1");
    assert.equal(byPath.get(asDocPath("g")), undefined);
  });

  it("appends grafted nodes to the matching group", () => {
    const grafted = graft(sample, new Map([["g/h", [page("g/h/z", "z")]], ["", [page("d", "d")]]]));
    assert.deepEqual(preorder(grafted).map((n) => n.path), ["g", "g/a", "g/h", "g/h/b", "g/h/z", "c", "d"]);
  });
});
