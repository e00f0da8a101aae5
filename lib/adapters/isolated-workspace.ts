// Temporary copy of a working tree, so branch work cannot be confused with
// checked-out content of the same name. Removed on dispose().

import os from "node:os";
import * as path from "node:path";
import fs from "fs-extra";
import type { IsolatedWorkspace, IWorkspaceIsolator } from "../ports/ports.ts";
import { asPath, type Path } from "../utils/types.ts";

export class TempDirWorkspaceIsolator implements IWorkspaceIsolator {
  private readonly tmpRoot: string;

  constructor(tmpRoot: string = os.tmpdir()) {
    this.tmpRoot = tmpRoot;
  }

  async isolate(dir: Path): Promise<IsolatedWorkspace> {
    const parent = await fs.mkdtemp(path.join(this.tmpRoot, "doctree-sync-"));
    const copy = path.join(parent, path.basename(dir));
    await fs.copy(dir, copy, { dereference: false });
    return {
      dir: asPath(copy),
      dispose: async () => {
        await fs.remove(parent);
      },
    };
  }
}
