import { err, ok, Result } from "@rentwatch/shared-utils";
import type Redis from "ioredis";
import { DocumentStateStore, StateDocument, StateStoreOptions } from "./state.base";
import { LoadError } from "./state.codec";

// The two commands the store needs; ioredis' client satisfies it
export type RedisDocumentClient = Pick<Redis, "get" | "set">;

/**
 * Same JSON documents as the file store, kept under <prefix>:<name>.
 * For runners that do not keep a disk between runs.
 */
export class RedisStateStore extends DocumentStateStore {
  constructor(
    private redis: RedisDocumentClient,
    private keyPrefix: string,
    options: StateStoreOptions
  ) {
    super(options);
  }

  protected locate(name: StateDocument): string {
    return `${this.keyPrefix}:${name}`;
  }

  protected async readDocument(name: StateDocument): Promise<Result<string, LoadError>> {
    const location = this.locate(name);

    try {
      const value = await this.redis.get(location);
      return value === null ? err({ kind: "missing", location }) : ok(value);
    } catch (cause) {
      return err({ kind: "unreadable", location, cause });
    }
  }

  protected async writeDocument(name: StateDocument, text: string): Promise<void> {
    await this.redis.set(this.locate(name), text);
  }
}
