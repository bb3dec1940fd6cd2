import * as fs from "fs/promises";
import * as path from "path";
import { err, ok, Result } from "@rentwatch/shared-utils";
import { DocumentStateStore, StateDocument, StateStoreOptions } from "./state.base";
import { LoadError } from "./state.codec";

/**
 * seen_ids.json + pending_listings.json in one directory, UTF-8 JSON
 */
export class FileStateStore extends DocumentStateStore {
  constructor(
    private dir: string,
    options: StateStoreOptions
  ) {
    super(options);
  }

  protected locate(name: StateDocument): string {
    return path.join(this.dir, `${name}.json`);
  }

  protected async readDocument(name: StateDocument): Promise<Result<string, LoadError>> {
    const location = this.locate(name);

    try {
      return ok(await fs.readFile(location, "utf-8"));
    } catch (cause) {
      if (isNotFound(cause)) {
        return err({ kind: "missing", location });
      }
      return err({ kind: "unreadable", location, cause });
    }
  }

  protected async writeDocument(name: StateDocument, text: string): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });
    await fs.writeFile(this.locate(name), text, "utf-8");
  }
}

function isNotFound(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}
