import { access, readdir } from "node:fs/promises";
import { StorageError } from "../errors.js";
import { safeJoin } from "../utils/safe-path.js";
import type { XCTestBundleDescriptor, XCTestBundleStorage } from "../xctest/types.js";

const XCTESTRUN_EXTENSION = ".xctestrun";

/** Test bundles installed as `<root>/<bundleId>.xctestrun`. */
export class DirectoryBundleStorage implements XCTestBundleStorage {
  readonly root: string;

  constructor(root: string) {
    this.root = root;
  }

  async resolveTestBundle(bundleId: string): Promise<XCTestBundleDescriptor> {
    let path: string;
    try {
      path = safeJoin(this.root, `${bundleId}${XCTESTRUN_EXTENSION}`);
    } catch (error) {
      throw new StorageError(`Invalid test bundle identifier: ${bundleId}`, { cause: error });
    }
    try {
      await access(path);
    } catch (error) {
      throw new StorageError(`Test bundle ${bundleId} not found`, { cause: error });
    }
    return { bundleId, path };
  }

  /** Identifiers of every installed bundle, sorted. */
  async listTestBundles(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(this.root);
    } catch (error) {
      throw new StorageError(`Cannot read bundle directory ${this.root}`, { cause: error });
    }
    return entries
      .filter((entry) => entry.endsWith(XCTESTRUN_EXTENSION))
      .map((entry) => entry.slice(0, -XCTESTRUN_EXTENSION.length))
      .sort();
  }
}
