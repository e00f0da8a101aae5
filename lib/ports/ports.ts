// Interfaces of the collaborators the core talks to. Adapters live in
// lib/adapters; tests provide in-memory doubles.

import type { Path, RemoteUrl } from "../utils/types.ts";

/** Documentation server holding flat topics inside one category. */
export interface IDocumentServer {
  /** Raw markdown of the document; follows redirects. Throws DocumentNotFoundError when absent. */
  get(url: RemoteUrl): Promise<string>;
  /** Creates an unlisted document and returns its address. */
  create(doc: { categoryId: number; title: string; content: string }): Promise<RemoteUrl>;
  update(url: RemoteUrl, content: string): Promise<void>;
  /** Resolves when the document is gone, including when it already was. */
  delete(url: RemoteUrl): Promise<void>;
  /** Throws DocumentNotFoundError when absent. */
  canWrite(url: RemoteUrl): Promise<boolean>;
}

export interface DirEntry {
  readonly name: string;
  readonly isDirectory: boolean;
  readonly isFile: boolean;
}

export interface IFileSystem {
  readText(p: Path): Promise<string>;
  writeText(p: Path, content: string): Promise<void>;
  exists(p: Path): Promise<boolean>;
  isDirectory(p: Path): Promise<boolean>;
  /** Direct children of a directory; symlinks are reported as neither file nor directory. */
  list(dir: Path): Promise<readonly DirEntry[]>;
  mkdirp(dir: Path): Promise<void>;
}

/** A git working tree. */
export interface IGitRepository {
  readonly cwd: Path;
  /** Same repository, operating in another working tree (e.g. an isolated copy). */
  at(cwd: Path): IGitRepository;
  /** Create or reset `branch` to the remote tip of `base`, regardless of the current HEAD. */
  switchToNewBranch(branch: string, base: string): Promise<void>;
  /** Stage `paths` and commit; returns false when nothing changed. */
  commit(message: string, paths: readonly string[]): Promise<boolean>;
  push(branch: string): Promise<void>;
}

export interface PullRequestRef {
  readonly url: string;
  readonly number: number;
}

export interface IPullRequestHost {
  defaultBranch(): Promise<string>;
  findOpen(head: string): Promise<PullRequestRef | null>;
  open(req: { head: string; base: string; title: string; body: string }): Promise<PullRequestRef>;
  close(pr: PullRequestRef): Promise<void>;
}

export interface IsolatedWorkspace {
  readonly dir: Path;
  dispose(): Promise<void>;
}

export interface IWorkspaceIsolator {
  /** Copy `dir` (including .git) into a fresh temporary directory. */
  isolate(dir: Path): Promise<IsolatedWorkspace>;
}
