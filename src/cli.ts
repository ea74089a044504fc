import logger from "./utils/logger";
import type { Catalog } from "./services/catalog";

export interface CliArgs {
  catalog?: string;
  relevance?: string;
  output?: string;
  conditions?: string[];
  limit?: number;
  force: boolean;
  retryFailed?: string;
  help: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export const HELP_TEXT = `
condition-kb: generate citation-backed articles for a condition catalog

Usage:
  npm start -- [options]

Options:
  --catalog <path>        Condition catalog, CSV or JSON (default: CATALOG_PATH or data/conditions.csv)
  --relevance <path>      Local document relevance file (default: RELEVANCE_PATH)
  --output <dir>          Output directory (default: OUTPUT_DIR or output)
  --conditions <ids>      Comma-separated condition ids to process
  --limit <n>             Process at most n conditions
  --force                 Regenerate articles that already exist
  --retry-failed <path>   Only process conditions that failed or stopped in a previous run-report.json
  --help                  Show this help text

Exit codes:
  0  every selected condition succeeded or was skipped
  1  at least one condition failed, or the run could not start
`;

const VALUE_FLAGS = new Set([
  "catalog",
  "relevance",
  "output",
  "conditions",
  "limit",
  "retry-failed",
]);
const BOOLEAN_FLAGS = new Set(["force", "help"]);

// Supports both --key=value and --key value
export function parseCliArgs(argv: string[]): CliArgs {
  const args: CliArgs = { force: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i] ?? "";
    if (token === "--") continue;
    if (token === "-h") {
      args.help = true;
      continue;
    }
    if (!token.startsWith("--")) {
      throw new CliUsageError(`Unexpected argument: ${token}`);
    }

    const raw = token.slice(2);
    const eqIdx = raw.indexOf("=");
    const key = eqIdx === -1 ? raw : raw.slice(0, eqIdx);

    if (BOOLEAN_FLAGS.has(key)) {
      if (key === "force") args.force = true;
      else args.help = true;
      continue;
    }
    if (!VALUE_FLAGS.has(key)) {
      throw new CliUsageError(`Unknown option: --${key}`);
    }

    let value: string | undefined;
    if (eqIdx !== -1) {
      value = raw.slice(eqIdx + 1);
    } else {
      value = argv[i + 1];
      i++;
    }
    if (value === undefined || value === "" || value.startsWith("--")) {
      throw new CliUsageError(`Missing value for --${key}`);
    }

    switch (key) {
      case "catalog":
        args.catalog = value;
        break;
      case "relevance":
        args.relevance = value;
        break;
      case "output":
        args.output = value;
        break;
      case "retry-failed":
        args.retryFailed = value;
        break;
      case "conditions":
        args.conditions = value
          .split(",")
          .map((id) => id.trim())
          .filter(Boolean);
        break;
      case "limit": {
        const limit = Number(value);
        if (!Number.isInteger(limit) || limit <= 0) {
          throw new CliUsageError(`Invalid --limit value: ${value}`);
        }
        args.limit = limit;
        break;
      }
    }
  }

  return args;
}

export interface Selection {
  ids?: readonly string[];
  limit?: number;
}

/**
 * Narrow the catalog to the requested ids (catalog order kept), then apply
 * the limit. Unknown ids are logged; a selection that matches nothing is an error.
 */
export function selectConditions(catalog: Catalog, { ids, limit }: Selection): Catalog {
  let selected = catalog;

  if (ids) {
    const wanted = new Set(ids);
    selected = catalog.filter((condition) => wanted.has(condition.id));
    const known = new Set(catalog.map((condition) => condition.id));
    const unknown = ids.filter((id) => !known.has(id));
    if (unknown.length > 0) {
      logger.warn({ unknown }, "unknown_conditions_requested");
    }
    if (selected.length === 0) {
      throw new CliUsageError(`None of the requested conditions are in the catalog: ${ids.join(", ")}`);
    }
  }

  return limit === undefined ? selected : selected.slice(0, limit);
}
