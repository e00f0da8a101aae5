// IFileSystem over fs-extra.

import fs from "fs-extra";
import type { DirEntry, IFileSystem } from "../ports/ports.ts";
import type { Path } from "../utils/types.ts";

export class NodeFileSystem implements IFileSystem {
  async readText(p: Path): Promise<string> {
    return await fs.readFile(p, "utf8");
  }

  async writeText(p: Path, content: string): Promise<void> {
    await fs.outputFile(p, content, "utf8");
  }

  async exists(p: Path): Promise<boolean> {
    return await fs.pathExists(p);
  }

  async isDirectory(p: Path): Promise<boolean> {
    try {
      return (await fs.stat(p)).isDirectory();
    } catch {
      return false;
    }
  }

  async list(dir: Path): Promise<readonly DirEntry[]> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    // Symlinks report neither kind and are not followed.
    return entries.map((e) => ({ name: e.name, isDirectory: e.isDirectory(), isFile: e.isFile() }));
  }

  async mkdirp(dir: Path): Promise<void> {
    await fs.ensureDir(dir);
  }
}
