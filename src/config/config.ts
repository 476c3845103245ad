// src/config/config.ts
// Configuration for the state-sync server and export helpers

import * as fs from "fs";
import * as path from "path";

// =========================================================================
// Configuration Types
// =========================================================================

export type ServerConfig = {
  /** Interface to bind */
  host: string;
  /** HTTP port; 0 picks a free one */
  port: number;
  /** WebSocket endpoint path */
  wsPath: string;
  /** Interval of the change-detection broadcast; 0 disables it */
  refreshIntervalMs: number;
  /** Value of Access-Control-Allow-Origin */
  corsOrigin: string;
  /** Directory of the static viewer page, relative to the working directory */
  staticDir: string;
};

export type ExportConfig = {
  /** JSON indentation for CLI dumps */
  indent: number;
};

export type ReflectKitConfig = {
  server: ServerConfig;
  export: ExportConfig;
};

export type PartialConfig = {
  server?: Partial<ServerConfig>;
  export?: Partial<ExportConfig>;
};

type Env = Record<string, string | undefined>;

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_SERVER_CONFIG: ServerConfig = {
  host: "0.0.0.0",
  port: 8080,
  wsPath: "/ws",
  refreshIntervalMs: 1000,
  corsOrigin: "*",
  staticDir: "public",
};

export const DEFAULT_EXPORT_CONFIG: ExportConfig = {
  indent: 2,
};

export const DEFAULT_CONFIG: ReflectKitConfig = {
  server: DEFAULT_SERVER_CONFIG,
  export: DEFAULT_EXPORT_CONFIG,
};

export const DEFAULT_CONFIG_FILES = ["reflectkit.config.json", "reflectkit.config.yaml", "reflectkit.config.yml"];

// =========================================================================
// Configuration Loading
// =========================================================================

function parseIntOr(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === "") return undefined;
  const n = parseInt(raw, 10);
  return Number.isNaN(n) ? undefined : n;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function pickString(data: Record<string, unknown>, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = data[key];
    if (typeof value === "string") return value;
  }
  return undefined;
}

function pickNumber(data: Record<string, unknown>, ...keys: string[]): number | undefined {
  for (const key of keys) {
    const value = data[key];
    if (typeof value === "number" && Number.isFinite(value)) return value;
  }
  return undefined;
}

function compact<T extends object>(obj: T): Partial<T> {
  const out: Partial<T> = {};
  for (const key in obj) {
    if (obj[key] !== undefined) out[key] = obj[key];
  }
  return out;
}

/**
 * Load configuration overrides from environment variables.
 * Only variables that are set appear in the result.
 */
export function configFromEnv(env: Env = process.env, prefix = "REFLECTKIT"): PartialConfig {
  return {
    server: compact({
      host: env[`${prefix}_HOST`] || undefined,
      port: parseIntOr(env[`${prefix}_PORT`]),
      wsPath: env[`${prefix}_WS_PATH`] || undefined,
      refreshIntervalMs: parseIntOr(env[`${prefix}_REFRESH_MS`]),
      corsOrigin: env[`${prefix}_CORS_ORIGIN`] || undefined,
      staticDir: env[`${prefix}_STATIC_DIR`] || undefined,
    }),
    export: compact({
      indent: parseIntOr(env[`${prefix}_INDENT`]),
    }),
  };
}

/**
 * Load configuration from a JSON or YAML file.
 */
export function configFromFile(filePath: string): PartialConfig {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const content = fs.readFileSync(filePath, "utf8");
  const ext = path.extname(filePath).toLowerCase();

  let data: unknown;

  if (ext === ".json") {
    data = JSON.parse(content);
  } else if (ext === ".yaml" || ext === ".yml") {
    data = parseSimpleYaml(content);
  } else {
    throw new Error(`Unsupported config file format: ${ext}`);
  }

  if (!isRecord(data)) {
    throw new Error(`Config file must contain an object: ${filePath}`);
  }
  return configFromObject(data);
}

/**
 * Create configuration from a plain object (e.g., from parsed JSON/YAML).
 * Accepts camelCase and snake_case keys.
 */
export function configFromObject(data: Record<string, unknown>): PartialConfig {
  const serverData = isRecord(data.server) ? data.server : {};
  const exportData = isRecord(data.export) ? data.export : {};

  return {
    server: compact({
      host: pickString(serverData, "host"),
      port: pickNumber(serverData, "port"),
      wsPath: pickString(serverData, "wsPath", "ws_path"),
      refreshIntervalMs: pickNumber(serverData, "refreshIntervalMs", "refresh_interval_ms"),
      corsOrigin: pickString(serverData, "corsOrigin", "cors_origin"),
      staticDir: pickString(serverData, "staticDir", "static_dir"),
    }),
    export: compact({
      indent: pickNumber(exportData, "indent"),
    }),
  };
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: PartialConfig[]): ReflectKitConfig {
  const result: ReflectKitConfig = {
    server: { ...DEFAULT_CONFIG.server },
    export: { ...DEFAULT_CONFIG.export },
  };

  for (const cfg of configs) {
    if (cfg.server) {
      result.server = { ...result.server, ...cfg.server };
    }
    if (cfg.export) {
      result.export = { ...result.export, ...cfg.export };
    }
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > environment > config file > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  env?: Env;
  cwd?: string;
  overrides?: PartialConfig;
}): ReflectKitConfig {
  const layers: PartialConfig[] = [];

  if (options?.configFile) {
    layers.push(configFromFile(options.configFile));
  } else {
    const cwd = options?.cwd ?? process.cwd();
    for (const name of DEFAULT_CONFIG_FILES) {
      const candidate = path.join(cwd, name);
      if (fs.existsSync(candidate)) {
        layers.push(configFromFile(candidate));
        break;
      }
    }
  }

  layers.push(configFromEnv(options?.env ?? process.env));

  if (options?.overrides) {
    layers.push(options.overrides);
  }

  return mergeConfigs(...layers);
}

// =========================================================================
// Simple YAML Parser (for basic configs only)
// =========================================================================

function parseSimpleYaml(content: string): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  const stack: Array<{ obj: Record<string, unknown>; indent: number }> = [{ obj: result, indent: -1 }];

  for (const rawLine of content.split("\n")) {
    const trimmed = rawLine.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const indent = rawLine.search(/\S/);

    while (stack.length > 1 && stack[stack.length - 1].indent >= indent) {
      stack.pop();
    }

    const parent = stack[stack.length - 1].obj;

    const colonIdx = trimmed.indexOf(":");
    if (colonIdx < 0) continue;

    const key = trimmed.slice(0, colonIdx).trim();
    const value = trimmed.slice(colonIdx + 1).trim();

    if (value === "") {
      const nested: Record<string, unknown> = {};
      parent[key] = nested;
      stack.push({ obj: nested, indent });
    } else if (value === "true" || value === "false") {
      parent[key] = value === "true";
    } else if (value === "null") {
      parent[key] = null;
    } else if (/^-?\d+(\.\d+)?$/.test(value)) {
      parent[key] = Number(value);
    } else if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
      parent[key] = value.slice(1, -1);
    } else {
      parent[key] = value;
    }
  }

  return result;
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: ReflectKitConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  const { port, wsPath, refreshIntervalMs } = config.server;
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    errors.push(`port must be an integer between 0 and 65535, got ${port}`);
  }
  if (!wsPath.startsWith("/")) {
    errors.push(`wsPath must start with "/", got "${wsPath}"`);
  }
  if (refreshIntervalMs < 0) {
    errors.push("refreshIntervalMs must not be negative");
  } else if (refreshIntervalMs > 0 && refreshIntervalMs < 50) {
    warnings.push("refreshIntervalMs below 50ms will broadcast very frequently");
  }
  if (config.export.indent < 0 || config.export.indent > 10) {
    warnings.push("export.indent outside 0-10 is clamped by JSON.stringify");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
