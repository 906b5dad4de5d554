import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import yaml from "js-yaml";

export type DatabaseDriver = "postgres" | "sqlite";

export interface DatabaseConfig {
  driver: DatabaseDriver;
  host: string;
  port: number;
  user: string;
  password: string;
  name: string;
  pool_size: number;
  data_dir: string;
}

export interface DatabaseGroupsConfig {
  default_group: string;
  groups: Record<string, DatabaseConfig>;
}

export interface InstrumentationConfig {
  enabled: boolean;
  buffer_size: number;
  flush_interval_ms: number;
}

export interface Config {
  database: DatabaseGroupsConfig;
  instrumentation: InstrumentationConfig;
}

type RawSection = Record<string, unknown>;

function section(raw: unknown): RawSection {
  if (raw !== null && typeof raw === "object" && !Array.isArray(raw)) {
    return Object.fromEntries(Object.entries(raw));
  }
  return {};
}

function str(v: unknown, fallback: string): string {
  if (typeof v === "string") return v;
  if (typeof v === "number") return String(v);
  return fallback;
}

function num(v: unknown, fallback: number): number {
  if (typeof v === "number") return v;
  if (typeof v === "string" && v.trim() !== "") {
    const n = Number(v);
    return isNaN(n) ? fallback : n;
  }
  return fallback;
}

function bool(v: unknown, fallback: boolean): boolean {
  if (typeof v === "boolean") return v;
  if (v === "true" || v === "1") return true;
  if (v === "false" || v === "0") return false;
  return fallback;
}

function driver(v: unknown): DatabaseDriver {
  return v === "sqlite" ? "sqlite" : "postgres";
}

export function databaseConfig(raw: unknown, env: NodeJS.ProcessEnv = {}): DatabaseConfig {
  const db = section(raw);
  return {
    driver: driver(env.FIELD_RULES_DB_DRIVER ?? db.driver),
    host: str(env.FIELD_RULES_DB_HOST ?? db.host, "localhost"),
    port: num(env.FIELD_RULES_DB_PORT ?? db.port, 5432),
    user: str(env.FIELD_RULES_DB_USER ?? db.user, "field_rules"),
    password: str(env.FIELD_RULES_DB_PASSWORD ?? db.password, "field_rules"),
    name: str(env.FIELD_RULES_DB_NAME ?? db.name, "field_rules"),
    pool_size: num(db.pool_size, 10),
    data_dir: str(db.data_dir, "./data"),
  };
}

/**
 * Builds the config from an already-parsed YAML document. Environment
 * overrides only apply to the default group.
 */
export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = {}): Config {
  const root = section(raw);
  const database = section(root.database);
  const instrumentation = section(root.instrumentation);

  const defaultGroup = str(database.default_group, "default");
  const groups: Record<string, DatabaseConfig> = {};
  for (const [name, group] of Object.entries(section(database.groups))) {
    groups[name] = databaseConfig(group, name === defaultGroup ? env : {});
  }
  if (!groups[defaultGroup]) {
    groups[defaultGroup] = databaseConfig({}, env);
  }

  return {
    database: {
      default_group: defaultGroup,
      groups,
    },
    instrumentation: {
      enabled: bool(instrumentation.enabled, false),
      buffer_size: num(instrumentation.buffer_size, 500),
      flush_interval_ms: num(instrumentation.flush_interval_ms, 100),
    },
  };
}

export function loadConfig(): Config {
  dotenv.config();

  const p = path.resolve("field-rules.yaml");
  const raw: unknown = fs.existsSync(p) ? yaml.load(fs.readFileSync(p, "utf-8")) : {};

  return parseConfig(raw, process.env);
}
