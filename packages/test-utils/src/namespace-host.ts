import { vi } from "vitest";

/** Structural match for the reader a diagnostics registry mounts. */
export interface MountedReader {
  read(offset: number, length: number): { readonly bytes: Uint8Array; readonly eof: boolean };
}

export interface MockNamespaceHostOptions {
  /** `"reject"` returns no handle, `"throw"` throws from `createDirectory`. */
  readonly failDirectory?: "reject" | "throw";
  /** Fails the `createEntry` call whose 1-based position matches. */
  readonly failEntryAt?: number;
  /** How the failing entry fails (default: `"reject"`). */
  readonly failEntryMode?: "reject" | "throw";
}

/**
 * Mock namespace host for testing registration and rollback.
 *
 * Directory handles are paths under `/proc`. Every method is a vitest mock
 * function; `entries` mirrors what is currently mounted.
 *
 * @example
 * ```typescript
 * const host = new MockNamespaceHost({ failEntryAt: 3 });
 * expect(() => diagnostics.init(host.root)).toThrow(ReportRegistrationError);
 * expect(host.removeEntry).toHaveBeenCalledTimes(2);
 * ```
 */
export class MockNamespaceHost {
  readonly root = "/proc";
  readonly directories = new Set<string>([this.root]);
  readonly entries = new Map<string, MountedReader>();
  private _entryCalls = 0;

  readonly createDirectory = vi.fn<(name: string, parent: string) => string | undefined>(
    (name, parent) => {
      if (this.options.failDirectory === "throw") {
        throw new Error(`mkdir ${parent}/${name} failed`);
      }
      if (this.options.failDirectory === "reject") {
        return undefined;
      }
      const path = `${parent}/${name}`;
      this.directories.add(path);
      return path;
    },
  );

  readonly createEntry = vi.fn<(name: string, directory: string, reader: MountedReader) => boolean>(
    (name, directory, reader) => {
      this._entryCalls++;
      if (this._entryCalls === this.options.failEntryAt) {
        if (this.options.failEntryMode === "throw") {
          throw new Error(`create ${directory}/${name} failed`);
        }
        return false;
      }
      this.entries.set(`${directory}/${name}`, reader);
      return true;
    },
  );

  readonly removeEntry = vi.fn<(name: string, directory: string) => void>((name, directory) => {
    this.entries.delete(`${directory}/${name}`);
  });

  readonly removeDirectory = vi.fn<(name: string, parent: string) => void>((name, parent) => {
    this.directories.delete(`${parent}/${name}`);
  });

  readonly pathOf = vi.fn<(directory: string) => string>((directory) => directory);

  constructor(private readonly options: MockNamespaceHostOptions = {}) {}

  /** Names of mounted entries in creation order. */
  entryNames(): string[] {
    return [...this.entries.keys()].map((path) => path.slice(path.lastIndexOf("/") + 1));
  }
}
