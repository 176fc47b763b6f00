import { mkdir, mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { errorMessage, StorageError } from "../errors.js";
import { safeJoin } from "../utils/safe-path.js";
import type { TemporaryDirectory } from "../xctest/types.js";

/** Per-session directories under one root, created with mkdtemp. */
export class NodeTemporaryDirectory implements TemporaryDirectory {
  readonly root: string;

  constructor(root: string = join(tmpdir(), "xcdelta")) {
    this.root = root;
  }

  async createSessionDirectory(sessionId: string): Promise<string> {
    const prefix = sessionId.replace(/[^A-Za-z0-9._-]/g, "_");
    try {
      await mkdir(this.root, { recursive: true });
      return await mkdtemp(join(this.root, `${prefix}-`));
    } catch (error) {
      throw new StorageError(
        `Failed to create a directory for ${sessionId}: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }

  /** Remove a directory created here. Paths outside the root are refused. */
  async remove(path: string): Promise<void> {
    let target: string;
    try {
      target = safeJoin(this.root, path);
    } catch (error) {
      throw new StorageError(`Refusing to remove ${path} outside ${this.root}`, { cause: error });
    }
    await rm(target, { recursive: true, force: true });
  }
}
