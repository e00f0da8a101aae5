// In-process doubles for the ports. Nothing here touches the network.

import * as os from "node:os";
import * as path from "node:path";
import fs from "fs-extra";
import { DocumentNotFoundError, ServerError } from "../../lib/domain/errors.ts";
import type { Notifier } from "../../lib/notifier/Notifier.ts";
import type {
  IDocumentServer,
  IGitRepository,
  IPullRequestHost,
  PullRequestRef,
} from "../../lib/ports/ports.ts";
import { asPath, asRemoteUrl, type Path, type RemoteUrl } from "../../lib/utils/types.ts";

export const FAKE_HOST = "https://docs.example.test";

function slugify(title: string): string {
  return title.toLowerCase().replace(/[^a-z0-9]+/g, "-").replace(/^-|-$/g, "") || "topic";
}

/**
 * Documentation server kept in a Map. Every call is logged as
 * "<method> <url-or-title>"; a logged string put in `failOn` makes that call throw.
 */
export class FakeDocumentServer implements IDocumentServer {
  readonly docs = new Map<string, string>();
  readonly calls: string[] = [];
  readonly failOn = new Set<string>();
  readonly readOnly = new Set<string>();
  private next = 1;

  /** Adds a document without logging a call. */
  seed(title: string, content: string): RemoteUrl {
    const url = asRemoteUrl(`${FAKE_HOST}/t/${slugify(title)}/${this.next++}`);
    this.docs.set(url, content);
    return url;
  }

  private record(call: string) {
    this.calls.push(call);
    if (this.failOn.has(call)) throw new ServerError(`${call} refused`, { status: 500 });
  }

  /** Calls other than reads. */
  writes(): string[] {
    return this.calls.filter((c) => !c.startsWith("get ") && !c.startsWith("canWrite "));
  }

  async get(url: RemoteUrl): Promise<string> {
    this.record(`get ${url}`);
    const content = this.docs.get(url);
    if (content === undefined) throw new DocumentNotFoundError(url);
    return content;
  }

  async create(doc: { categoryId: number; title: string; content: string }): Promise<RemoteUrl> {
    this.record(`create ${doc.title}`);
    return this.seed(doc.title, doc.content);
  }

  async update(url: RemoteUrl, content: string): Promise<void> {
    this.record(`update ${url}`);
    if (!this.docs.has(url)) throw new DocumentNotFoundError(url);
    this.docs.set(url, content);
  }

  async delete(url: RemoteUrl): Promise<void> {
    this.record(`delete ${url}`);
    this.docs.delete(url);
  }

  async canWrite(url: RemoteUrl): Promise<boolean> {
    this.record(`canWrite ${url}`);
    if (!this.docs.has(url)) throw new DocumentNotFoundError(url);
    return !this.readOnly.has(url);
  }
}

export class RecordingNotifier implements Notifier {
  readonly lines: string[] = [];

  debug(message: string): void {
    this.lines.push(`debug: ${message}`);
  }
  info(message: string): void {
    this.lines.push(`info: ${message}`);
  }
  warn(message: string): void {
    this.lines.push(`warn: ${message}`);
  }
  error(message: string): void {
    this.lines.push(`error: ${message}`);
  }
}

/** Logs "<cwd>: <operation>" for every call; shared by every `at()` view. */
export class FakeGitRepository implements IGitRepository {
  readonly cwd: Path;
  readonly log: string[];
  /** Result of commit(); false means the tree was already clean. */
  changes = true;

  constructor(cwd: Path, log: string[] = []) {
    this.cwd = cwd;
    this.log = log;
  }

  at(cwd: Path): FakeGitRepository {
    const view = new FakeGitRepository(cwd, this.log);
    view.changes = this.changes;
    return view;
  }

  async switchToNewBranch(branch: string, base: string): Promise<void> {
    this.log.push(`${this.cwd}: switch ${branch} from ${base}`);
  }

  async commit(message: string, paths: readonly string[]): Promise<boolean> {
    this.log.push(`${this.cwd}: commit ${paths.join(",")} "${message}"`);
    return this.changes;
  }

  async push(branch: string): Promise<void> {
    this.log.push(`${this.cwd}: push ${branch}`);
  }
}

export class FakePullRequestHost implements IPullRequestHost {
  readonly opened: { head: string; base: string; title: string; body: string }[] = [];
  readonly closed: PullRequestRef[] = [];
  existing: PullRequestRef | null = null;

  async defaultBranch(): Promise<string> {
    return "main";
  }

  async findOpen(_head: string): Promise<PullRequestRef | null> {
    return this.existing;
  }

  async open(req: { head: string; base: string; title: string; body: string }): Promise<PullRequestRef> {
    this.opened.push(req);
    return { url: `https://github.example.test/pulls/${this.opened.length}`, number: this.opened.length };
  }

  async close(pr: PullRequestRef): Promise<void> {
    this.closed.push(pr);
  }
}

/** Fresh temporary directory, removed by the returned cleanup. */
export async function makeTempDir(prefix = "doctree-sync-test-"): Promise<{ dir: Path; cleanup: () => Promise<void> }> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  return { dir: asPath(dir), cleanup: () => fs.remove(dir) };
}

/** Write files given as relative path -> content; a trailing "/" makes an empty directory. */
export async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [rel, content] of Object.entries(files)) {
    const target = path.join(root, rel);
    if (rel.endsWith("/")) await fs.ensureDir(target);
    else await fs.outputFile(target, content, "utf8");
  }
}
