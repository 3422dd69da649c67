import * as fs from "node:fs/promises";
import { loadDeviceSnapshot } from "@devinfo/device";
import { ValidationError } from "@devinfo/errors";
import { parse as parseYaml } from "yaml";
import { DEFAULT_CHUNK_SIZE } from "./constants.js";
import { DeviceDiagnostics } from "./diagnostics.js";
import { MemoryNamespaceHost } from "./host/memory-host.js";

// ---------------------------------------------------------------------------
// Argument parsing (minimal, no external CLI lib)
// ---------------------------------------------------------------------------

export interface CatArgs {
  readonly device?: string;
  readonly reports: readonly string[];
  readonly all: boolean;
  readonly list: boolean;
  readonly chunk: number;
  readonly debug: boolean;
  readonly help: boolean;
}

/**
 * Parses `devinfo-cat` options. `argv` excludes the node binary and script.
 *
 * @throws {ValidationError} for unknown options or a bad `--chunk` value
 */
export function parseCatArgs(argv: readonly string[]): CatArgs {
  let device: string | undefined;
  const reports: string[] = [];
  let all = false;
  let list = false;
  let chunk = DEFAULT_CHUNK_SIZE;
  let debug = false;
  let help = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];

    switch (arg) {
      case "--device":
        if (next) {
          device = next;
          i++;
        }
        break;
      case "--report":
        if (next) {
          reports.push(...next.split(","));
          i++;
        }
        break;
      case "--all":
        all = true;
        break;
      case "--list":
        list = true;
        break;
      case "--chunk": {
        const size = Number(next);
        if (!Number.isSafeInteger(size) || size < 1) {
          throw new ValidationError(`--chunk expects a positive integer, got '${String(next)}'`);
        }
        chunk = size;
        i++;
        break;
      }
      case "--debug":
        debug = true;
        break;
      case "--help":
        help = true;
        break;
      default:
        throw new ValidationError(`Unknown option '${String(arg)}'`);
    }
  }

  return { ...(device ? { device } : {}), reports, all, list, chunk, debug, help };
}

export const CAT_HELP = `
devinfo-cat - Print diagnostic reports of a device snapshot

Usage: devinfo-cat --device <snapshot> [options]

Options:
  --device <path>       Device snapshot, JSON or YAML (required)
  --report <name,...>   Reports to print (default: name)
  --all                 Print every registered report
  --list                List the mounted report entries
  --chunk <bytes>       Read size per call (default: ${DEFAULT_CHUNK_SIZE})
  --debug               Also register the vma report
  --help                Show this help message
`;

// ---------------------------------------------------------------------------
// Run
// ---------------------------------------------------------------------------

export interface CatIo {
  readonly readFile: (path: string) => Promise<string>;
  readonly write: (text: string) => void;
}

const defaultIo: CatIo = {
  readFile: (path) => fs.readFile(path, "utf-8"),
  write: (text) => {
    process.stdout.write(text);
  },
};

/**
 * Mounts the snapshot's device on an in-memory host and prints the
 * requested entries through chunked reads. Returns the exit code.
 */
export async function runCat(args: CatArgs, io: CatIo = defaultIo): Promise<number> {
  if (args.help) {
    io.write(CAT_HELP);
    return 0;
  }
  if (!args.device) {
    throw new ValidationError("--device is required");
  }

  const raw: unknown = parseYaml(await io.readFile(args.device));
  const device = loadDeviceSnapshot(raw, args.device);
  const host = new MemoryNamespaceHost();
  const diagnostics = new DeviceDiagnostics(device, host, { config: { debug: args.debug } });
  const directory = diagnostics.init(host.root);

  try {
    if (args.list) {
      for (const entry of host.list(directory)) {
        io.write(`${directory}/${entry.name}\n`);
      }
      return 0;
    }

    const names = args.all
      ? diagnostics.reportNames
      : args.reports.length > 0
        ? args.reports
        : ["name"];
    const multiple = names.length > 1;

    for (const name of names) {
      const path = `${directory}/${name}`;
      if (!host.exists(path)) {
        console.error(`[devinfo-cat] No such report: ${name}`);
        return 1;
      }
      if (multiple) {
        io.write(`==> ${path} <==\n`);
      }
      io.write(host.cat(path, args.chunk));
    }
    return 0;
  } finally {
    diagnostics.teardown(host.root);
  }
}
