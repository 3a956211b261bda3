/**
 * CLI configuration: repository connection, rule and journal storage.
 *
 * Defaults:
 *   Base dir:     ~/.scan-curator/
 *   Config file:  <base>/config.yaml (optional)
 *   Rules DB:     <base>/rules.sqlite
 *   Journal DB:   <base>/journal.sqlite
 *
 * Environment overrides (win over the config file):
 *   SCAN_CURATOR_HOME          base directory
 *   SCAN_CURATOR_CONFIG        config file path
 *   SCAN_CURATOR_RULES_DB      rules SQLite path
 *   SCAN_CURATOR_RULES_CSV     read rules from this CSV instead of the DB
 *   SCAN_CURATOR_EXPECTATIONS  quality expectations YAML
 *   SCAN_CURATOR_JOURNAL_DB    apply journal SQLite path
 *   SCAN_CURATOR_TIMEOUT_MS    per-request timeout
 *   XNAT_HOST, XNAT_USER, XNAT_PASS, XNAT_PROJECT
 */

import { existsSync, mkdirSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, join, resolve } from "node:path";
import yaml from "yaml";
import { z } from "zod";
import { EngineError } from "../engine/errors.js";
import {
  DEFAULT_FIELD_VALUES,
  type DefaultFieldValues,
} from "../engine/update-executor.js";

export interface XnatSettings {
  host?: string;
  user?: string;
  password?: string;
  project: string;
  timeoutMs: number;
}

export interface CuratorConfig {
  baseDir: string;
  configPath: string;
  rulesDbPath: string;
  rulesCsvPath?: string;
  expectationsPath?: string;
  journalDbPath: string;
  xnat: XnatSettings;
  defaults: DefaultFieldValues;
}

const DEFAULT_PROJECT = "CUTTING";
const DEFAULT_TIMEOUT_MS = 30_000;

const ConfigFileSchema = z
  .object({
    xnat: z
      .object({
        host: z.string().url().optional(),
        user: z.string().min(1).optional(),
        password: z.string().optional(),
        project: z.string().min(1).optional(),
        timeoutMs: z.number().int().positive().optional(),
      })
      .strict()
      .default({}),
    rules: z
      .object({
        csv: z.string().min(1).optional(),
        db: z.string().min(1).optional(),
      })
      .strict()
      .default({}),
    expectations: z.string().min(1).optional(),
    journal: z.string().min(1).optional(),
    defaults: z
      .object({
        type: z.array(z.string()).optional(),
        quality: z.array(z.string()).optional(),
      })
      .strict()
      .default({}),
  })
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

function readConfigFile(path: string): ConfigFile {
  if (!existsSync(path)) return ConfigFileSchema.parse({});
  let doc: unknown;
  try {
    doc = yaml.parse(readFileSync(path, "utf8"));
  } catch (e: unknown) {
    throw new EngineError(
      `Config file ${path} is not valid YAML: ${e instanceof Error ? e.message : String(e)}`,
      "CONFIG_INVALID",
      { path },
    );
  }
  const result = ConfigFileSchema.safeParse(doc ?? {});
  if (!result.success) {
    throw new EngineError(
      `Invalid config file ${path}: ${result.error.issues
        .map((i) => `${i.path.join(".")}: ${i.message}`)
        .join("; ")}`,
      "CONFIG_INVALID",
      { path },
    );
  }
  return result.data;
}

function parseTimeout(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) {
    throw new EngineError(
      `SCAN_CURATOR_TIMEOUT_MS must be a positive integer, got "${raw}"`,
      "CONFIG_INVALID",
    );
  }
  return n;
}

export function resolveConfig(env: NodeJS.ProcessEnv = process.env): CuratorConfig {
  const baseDir = resolve(env["SCAN_CURATOR_HOME"] ?? join(homedir(), ".scan-curator"));
  const configPath = resolve(env["SCAN_CURATOR_CONFIG"] ?? join(baseDir, "config.yaml"));
  const file = readConfigFile(configPath);

  // Paths from the config file are relative to the file itself.
  const fromFile = (p: string | undefined) =>
    p === undefined ? undefined : resolve(dirname(configPath), p);
  const fromEnv = (name: string) => {
    const v = env[name];
    return v === undefined || v === "" ? undefined : resolve(v);
  };

  const rulesCsvPath = fromEnv("SCAN_CURATOR_RULES_CSV") ?? fromFile(file.rules.csv);
  const expectationsPath =
    fromEnv("SCAN_CURATOR_EXPECTATIONS") ?? fromFile(file.expectations);
  const host = env["XNAT_HOST"] ?? file.xnat.host;
  const user = env["XNAT_USER"] ?? file.xnat.user;
  const password = env["XNAT_PASS"] ?? file.xnat.password;

  return {
    baseDir,
    configPath,
    rulesDbPath:
      fromEnv("SCAN_CURATOR_RULES_DB") ??
      fromFile(file.rules.db) ??
      join(baseDir, "rules.sqlite"),
    ...(rulesCsvPath !== undefined ? { rulesCsvPath } : {}),
    ...(expectationsPath !== undefined ? { expectationsPath } : {}),
    journalDbPath:
      fromEnv("SCAN_CURATOR_JOURNAL_DB") ??
      fromFile(file.journal) ??
      join(baseDir, "journal.sqlite"),
    xnat: {
      ...(host !== undefined ? { host } : {}),
      ...(user !== undefined ? { user } : {}),
      ...(password !== undefined ? { password } : {}),
      project: env["XNAT_PROJECT"] ?? file.xnat.project ?? DEFAULT_PROJECT,
      timeoutMs:
        parseTimeout(env["SCAN_CURATOR_TIMEOUT_MS"]) ??
        file.xnat.timeoutMs ??
        DEFAULT_TIMEOUT_MS,
    },
    defaults: {
      type: file.defaults.type ?? DEFAULT_FIELD_VALUES.type,
      quality: file.defaults.quality ?? DEFAULT_FIELD_VALUES.quality,
    },
  };
}

/** Copy of the config safe to print (credentials masked). */
export function redactConfig(config: CuratorConfig): CuratorConfig {
  return {
    ...config,
    xnat: {
      ...config.xnat,
      ...(config.xnat.password !== undefined ? { password: "[REDACTED]" } : {}),
    },
  };
}

/**
 * Ensure the base directory and the directories of both databases exist.
 */
export function ensureDataDirs(config: CuratorConfig): void {
  mkdirSync(config.baseDir, { recursive: true });
  mkdirSync(dirname(config.rulesDbPath), { recursive: true });
  mkdirSync(dirname(config.journalDbPath), { recursive: true });
}
