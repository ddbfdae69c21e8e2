import { createUsageError } from "../error";

export const ADMIN_USAGE = [
  "Usage:",
  "  admin embedding show [--key <key>]",
  "  admin embedding persist <inputFile> [--key <key>] [--out <path>]",
  "  admin state show <sessionId> [--db <path>]",
  "  admin state migrate-legacy [--db <path>] [--table <name>] --yes",
].join("\n");

export type AdminCommand =
  | { readonly kind: "embedding-show"; readonly key?: string }
  | {
      readonly kind: "embedding-persist";
      readonly inputFile: string;
      readonly key?: string;
      readonly out?: string;
    }
  | { readonly kind: "state-show"; readonly sessionId: string; readonly dbPath?: string }
  | {
      readonly kind: "state-migrate-legacy";
      readonly dbPath?: string;
      readonly table?: string;
      readonly confirmed: boolean;
    };

const VALUE_FLAGS = new Set(["--key", "--out", "--db", "--table"]);
const BOOLEAN_FLAGS = new Set(["--yes"]);

interface SplitArgs {
  readonly positional: readonly string[];
  readonly flags: ReadonlyMap<string, string>;
  readonly switches: ReadonlySet<string>;
}

function splitArgs(argv: readonly string[]): SplitArgs {
  const positional: string[] = [];
  const flags = new Map<string, string>();
  const switches = new Set<string>();

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i] ?? "";
    if (token === "--") {
      continue;
    }
    if (VALUE_FLAGS.has(token)) {
      const next = argv[i + 1];
      if (typeof next !== "string" || next.trim() === "" || next.startsWith("--")) {
        throw createUsageError(`${token} requires a value`, ADMIN_USAGE);
      }
      flags.set(token, next.trim());
      i += 1;
      continue;
    }
    if (BOOLEAN_FLAGS.has(token)) {
      switches.add(token);
      continue;
    }
    if (token.startsWith("--")) {
      throw createUsageError(`unknown option ${token}`, ADMIN_USAGE);
    }
    positional.push(token);
  }

  return { positional, flags, switches };
}

export function parseAdminArgs(argv: readonly string[]): AdminCommand {
  const { positional, flags, switches } = splitArgs(argv);
  const [group, action, operand] = positional;

  if (group === "embedding" && action === "show" && positional.length === 2) {
    return { kind: "embedding-show", key: flags.get("--key") };
  }
  if (group === "embedding" && action === "persist") {
    if (typeof operand !== "string" || operand.trim() === "" || positional.length !== 3) {
      throw createUsageError("embedding persist requires exactly one inputFile", ADMIN_USAGE);
    }
    return {
      kind: "embedding-persist",
      inputFile: operand,
      key: flags.get("--key"),
      out: flags.get("--out"),
    };
  }
  if (group === "state" && action === "show") {
    if (typeof operand !== "string" || operand.trim() === "" || positional.length !== 3) {
      throw createUsageError("state show requires exactly one sessionId", ADMIN_USAGE);
    }
    return { kind: "state-show", sessionId: operand, dbPath: flags.get("--db") };
  }
  if (group === "state" && action === "migrate-legacy" && positional.length === 2) {
    return {
      kind: "state-migrate-legacy",
      dbPath: flags.get("--db"),
      table: flags.get("--table"),
      confirmed: switches.has("--yes"),
    };
  }

  throw createUsageError(`unsupported command '${positional.join(" ")}'`, ADMIN_USAGE);
}
