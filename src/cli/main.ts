/**
 * scanctl command dispatch.
 *
 * Usage:
 *   scanctl <command> [options]
 *
 * Commands:
 *   init                          Initialize data directory and databases
 *   config show [--json]          Show resolved configuration
 *   check-label <label...>        Validate subject labels
 *   review <subject...>           Show findings and the update plan
 *   apply <subject>               Apply the update plan, journal the outcome
 *   rules import <csv>            Replace stored rename rules from CSV
 *   rules list                    List stored rename rules
 *   journal show --run <id>       List journal events of an apply run
 *   journal verify --run <id>     Verify a run's hash chain
 */

import { resolveConfig } from "./config.js";
import {
  cmdInit,
  cmdConfigShow,
  cmdCheckLabel,
  cmdReview,
  cmdApply,
  cmdRulesImport,
  cmdRulesList,
  cmdJournalShow,
  cmdJournalVerify,
} from "./commands.js";

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

/** Flags that never take a value. */
const BOOLEAN_FLAGS: ReadonlySet<string> = new Set([
  "json",
  "overwrite",
  "help",
  "h",
]);

export function parseArgs(argv: string[]): {
  positional: string[];
  flags: Map<string, string>;
  boolFlags: Set<string>;
} {
  const positional: string[] = [];
  const flags = new Map<string, string>();
  const boolFlags = new Set<string>();

  let i = 0;
  while (i < argv.length) {
    const arg = argv[i] ?? "";
    if (arg.startsWith("--")) {
      const name = arg.slice(2);
      const next = argv[i + 1];
      if (!BOOLEAN_FLAGS.has(name) && next !== undefined && !next.startsWith("--")) {
        flags.set(name, next);
        i += 2;
      } else {
        boolFlags.add(name);
        flags.set(name, "true");
        i += 1;
      }
    } else {
      positional.push(arg);
      i += 1;
    }
  }

  return { positional, flags, boolFlags };
}

// ---------------------------------------------------------------------------
// Usage
// ---------------------------------------------------------------------------

const USAGE = `scanctl — scan-curator CLI

Usage:
  scanctl init
  scanctl config show [--json]
  scanctl check-label <label...> [--json]
  scanctl review <subject...> [--snapshot <file>] [--json]
  scanctl apply <subject> [--overwrite] [--scans <id,id>] [--snapshot <file>] [--json]
  scanctl rules import <csv> [--json]
  scanctl rules list [--json]
  scanctl journal show --run <id> [--json]
  scanctl journal verify --run <id> [--json]

Environment:
  XNAT_HOST, XNAT_USER, XNAT_PASS, XNAT_PROJECT   Repository connection
  SCAN_CURATOR_HOME         Override data directory
  SCAN_CURATOR_CONFIG       Override config file path
  SCAN_CURATOR_RULES_CSV    Read rename rules from a CSV instead of the DB
  SCAN_CURATOR_EXPECTATIONS Quality expectations YAML
  LOG_LEVEL                 pino log level (default info)
`;

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

export async function main(
  raw: string[],
  env: NodeJS.ProcessEnv = process.env,
): Promise<number> {
  if (raw.length === 0) {
    process.stderr.write(USAGE);
    return 1;
  }

  const { positional, flags, boolFlags } = parseArgs(raw);
  const json = boolFlags.has("json");

  if (boolFlags.has("help") || boolFlags.has("h") || positional[0] === "help") {
    process.stdout.write(USAGE);
    return 0;
  }

  const config = resolveConfig(env);
  const command = positional[0];

  switch (command) {
    case "init":
      return cmdInit(config);

    case "config":
      if (positional[1] === "show") {
        return cmdConfigShow(config, json);
      }
      process.stderr.write("Unknown config subcommand. Use: config show\n");
      return 1;

    case "check-label": {
      const labels = positional.slice(1);
      if (labels.length === 0) {
        process.stderr.write("Usage: scanctl check-label <label...>\n");
        return 1;
      }
      return cmdCheckLabel(labels, json);
    }

    case "review": {
      const subjects = positional.slice(1);
      if (subjects.length === 0) {
        process.stderr.write("Usage: scanctl review <subject...>\n");
        return 1;
      }
      return cmdReview(subjects, flags, config, json);
    }

    case "apply": {
      const subject = positional[1];
      if (!subject) {
        process.stderr.write("Usage: scanctl apply <subject>\n");
        return 1;
      }
      return cmdApply(subject, flags, boolFlags.has("overwrite"), config, json);
    }

    case "rules":
      if (positional[1] === "import") {
        const file = positional[2];
        if (!file) {
          process.stderr.write("Usage: scanctl rules import <csv>\n");
          return 1;
        }
        return cmdRulesImport(file, config, json);
      }
      if (positional[1] === "list") {
        return cmdRulesList(config, json);
      }
      process.stderr.write("Unknown rules subcommand. Use: rules import | rules list\n");
      return 1;

    case "journal":
      if (positional[1] === "show") {
        return cmdJournalShow(flags, config, json);
      }
      if (positional[1] === "verify") {
        return cmdJournalVerify(flags, config, json);
      }
      process.stderr.write("Unknown journal subcommand. Use: journal show | journal verify\n");
      return 1;

    default:
      process.stderr.write(`Unknown command: ${command}\n\n${USAGE}`);
      return 1;
  }
}
