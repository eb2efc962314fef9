/**
 * Bearer token persistence: a dotenv-format file holding the token and the
 * instant it was issued.
 *
 * No locking is done. Two processes sharing one token file can both exchange
 * credentials and overwrite each other's entries.
 */

import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import { z } from "zod";
import { type Logger, silentLogger } from "../logger.js";

export const TOKEN_FILENAME = ".token";
/** The `token` entry */
export const TOKEN_KEY = "UP_TOKEN";
/** The `token_timestamp` entry: ISO-8601 instant the token was issued */
export const TOKEN_TIMESTAMP_KEY = "UP_TOKEN_TIMESTAMP";

const TOKEN_FILE_HEADER = "# Automatically created ***DO NOT EDIT***";

export interface Token {
  readonly value: string;
  readonly issuedAt: Date;
}

export interface TokenStoreOptions {
  /** Skip reading any stored token so the next request exchanges credentials */
  forceNew?: boolean;
  logger?: Logger;
}

const timestampSchema = z.string().datetime({ offset: true });

function entryLine(key: string, value: string): string {
  return value === "" ? `${key}=` : `${key}='${value}'`;
}

function isEntryFor(line: string, key: string): boolean {
  return new RegExp(`^\\s*(export\\s+)?${key}\\s*=`).test(line);
}

export class TokenStore {
  private token: Token | null = null;

  private constructor(
    readonly filePath: string,
    private readonly logger: Logger
  ) {}

  /**
   * Open the token file in `dir`, creating it with empty entries when absent.
   * An existing file is loaded unless `forceNew` is set.
   */
  static open(dir: string, options: TokenStoreOptions = {}): TokenStore {
    const store = new TokenStore(path.join(dir, TOKEN_FILENAME), options.logger ?? silentLogger);
    if (!fs.existsSync(store.filePath)) {
      store.create();
    } else if (!options.forceNew) {
      store.token = store.load();
    }
    return store;
  }

  /** In-memory token; null when unset */
  get current(): Token | null {
    return this.token;
  }

  /**
   * Read the stored token. A missing, empty or non-ISO-8601 timestamp means
   * unset, whatever the token entry holds.
   */
  load(): Token | null {
    const entries = this.readEntries();
    const value = entries[TOKEN_KEY] ?? "";
    const stamp = entries[TOKEN_TIMESTAMP_KEY] ?? "";
    if (value === "" || !timestampSchema.safeParse(stamp).success) {
      return null;
    }
    return { value, issuedAt: new Date(stamp) };
  }

  /** Persist both entries (null clears them) and update the in-memory token. */
  save(token: Token | null): void {
    this.writeEntries({
      [TOKEN_TIMESTAMP_KEY]: token ? token.issuedAt.toISOString() : "",
      [TOKEN_KEY]: token ? token.value : "",
    });
    this.token = token;
  }

  private create(): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.writeFileSync(
      this.filePath,
      [TOKEN_FILE_HEADER, entryLine(TOKEN_KEY, ""), entryLine(TOKEN_TIMESTAMP_KEY, ""), ""].join("\n"),
      "utf-8"
    );
    this.logger.warn("Created token store", { path: this.filePath });
  }

  private readEntries(): Record<string, string> {
    if (!fs.existsSync(this.filePath)) return {};
    return dotenv.parse(fs.readFileSync(this.filePath));
  }

  /** Rewrite the given keys in place, keeping every other line of the file. */
  private writeEntries(entries: Record<string, string>): void {
    const existing = fs.existsSync(this.filePath)
      ? fs.readFileSync(this.filePath, "utf-8").split("\n")
      : [TOKEN_FILE_HEADER];
    const pending = new Map(Object.entries(entries));
    const lines = existing.map((line) => {
      for (const [key, value] of pending) {
        if (isEntryFor(line, key)) {
          pending.delete(key);
          return entryLine(key, value);
        }
      }
      return line;
    });
    while (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
    for (const [key, value] of pending) lines.push(entryLine(key, value));
    fs.writeFileSync(this.filePath, `${lines.join("\n")}\n`, "utf-8");
  }
}
