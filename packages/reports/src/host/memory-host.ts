import { NotFoundError } from "@devinfo/errors";
import { DEFAULT_CHUNK_SIZE } from "../constants.js";
import { drainReport } from "../paginate.js";
import type { NamespaceHost, ReportChunk, ReportReader } from "../types.js";

export type NamespaceEntryType = "file" | "directory";

export interface NamespaceListing {
  readonly name: string;
  readonly type: NamespaceEntryType;
}

const decoder = new TextDecoder();

function join(parent: string, name: string): string {
  return parent === "/" ? `/${name}` : `${parent}/${name}`;
}

/**
 * In-memory virtual filesystem for mounting diagnostics.
 *
 * Directory handles are absolute paths. Entries hold the reader they were
 * registered with; reading an entry calls straight back into it.
 */
export class MemoryNamespaceHost implements NamespaceHost<string> {
  readonly root: string;
  private readonly _dirs = new Set<string>();
  private readonly _entries = new Map<string, ReportReader>();

  constructor(root = "/dri") {
    this.root = root;
    this._dirs.add(root);
  }

  createDirectory(name: string, parent: string): string | undefined {
    const path = join(parent, name);
    if (!this._dirs.has(parent) || this.exists(path)) {
      return undefined;
    }
    this._dirs.add(path);
    return path;
  }

  createEntry(name: string, directory: string, reader: ReportReader): boolean {
    const path = join(directory, name);
    if (!this._dirs.has(directory) || this.exists(path)) {
      return false;
    }
    this._entries.set(path, reader);
    return true;
  }

  removeEntry(name: string, directory: string): void {
    this._entries.delete(join(directory, name));
  }

  removeDirectory(name: string, parent: string): void {
    const path = join(parent, name);
    if (path === this.root) return;
    for (const entry of this.list(path)) {
      if (entry.type === "directory") {
        this.removeDirectory(entry.name, path);
      } else {
        this.removeEntry(entry.name, path);
      }
    }
    this._dirs.delete(path);
  }

  pathOf(directory: string): string {
    return directory;
  }

  exists(path: string): boolean {
    return this._dirs.has(path) || this._entries.has(path);
  }

  isDirectory(path: string): boolean {
    return this._dirs.has(path);
  }

  /** Direct children of `path`, sorted by name. */
  list(path: string): readonly NamespaceListing[] {
    const prefix = path === "/" ? "/" : `${path}/`;
    const result: NamespaceListing[] = [];
    const collect = (candidate: string, type: NamespaceEntryType): void => {
      if (!candidate.startsWith(prefix)) return;
      const rest = candidate.slice(prefix.length);
      if (rest.length === 0 || rest.includes("/")) return;
      result.push({ name: rest, type });
    };

    for (const dir of this._dirs) collect(dir, "directory");
    for (const entry of this._entries.keys()) collect(entry, "file");
    return result.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }

  /**
   * @throws {NotFoundError} when no entry exists at `path`
   */
  read(path: string, offset: number, length: number): ReportChunk {
    return this.entry(path).read(offset, length);
  }

  /** Whole entry content, read in `chunkSize` steps. */
  cat(path: string, chunkSize = DEFAULT_CHUNK_SIZE): string {
    return decoder.decode(drainReport(this.entry(path), chunkSize));
  }

  private entry(path: string): ReportReader {
    const reader = this._entries.get(path);
    if (!reader) {
      throw new NotFoundError("Entry", path);
    }
    return reader;
  }
}
