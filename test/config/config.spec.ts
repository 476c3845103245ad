import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  DEFAULT_CONFIG,
  configFromEnv,
  configFromFile,
  configFromObject,
  loadConfig,
  mergeConfigs,
  validateConfig,
} from "../../src/config";

describe("config", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "reflectkit-config-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe("Happy Path", () => {
    it("uses defaults when nothing is set", () => {
      const config = loadConfig({ env: {}, cwd: dir });
      expect(config).toEqual(DEFAULT_CONFIG);
      expect(config.server).toEqual({
        host: "0.0.0.0",
        port: 8080,
        wsPath: "/ws",
        refreshIntervalMs: 1000,
        corsOrigin: "*",
        staticDir: "public",
      });
    });

    it("reads environment variables", () => {
      const partial = configFromEnv({
        REFLECTKIT_PORT: "9000",
        REFLECTKIT_WS_PATH: "/live",
        REFLECTKIT_REFRESH_MS: "0",
        REFLECTKIT_INDENT: "4",
      });
      expect(partial).toEqual({
        server: { port: 9000, wsPath: "/live", refreshIntervalMs: 0 },
        export: { indent: 4 },
      });
    });

    it("accepts camelCase and snake_case keys", () => {
      expect(configFromObject({ server: { ws_path: "/a", corsOrigin: "http://localhost" } })).toEqual({
        server: { wsPath: "/a", corsOrigin: "http://localhost" },
        export: {},
      });
    });

    it("loads a YAML file found in the working directory", () => {
      fs.writeFileSync(
        path.join(dir, "reflectkit.config.yaml"),
        [
          "# live server",
          "server:",
          "  port: 9100",
          '  host: "127.0.0.1"',
          "  refresh_interval_ms: 250",
          "export:",
          "  indent: 0",
          "",
        ].join("\n")
      );

      const config = loadConfig({ env: {}, cwd: dir });
      expect(config.server.port).toBe(9100);
      expect(config.server.host).toBe("127.0.0.1");
      expect(config.server.refreshIntervalMs).toBe(250);
      expect(config.export.indent).toBe(0);
    });

    it("layers file, then environment, then overrides", () => {
      const file = path.join(dir, "custom.json");
      fs.writeFileSync(file, JSON.stringify({ server: { port: 7000, host: "localhost", wsPath: "/file" } }));

      const config = loadConfig({
        configFile: file,
        env: { REFLECTKIT_PORT: "7100", REFLECTKIT_WS_PATH: "/env" },
        overrides: { server: { port: 7200 } },
      });
      expect(config.server.host).toBe("localhost");
      expect(config.server.wsPath).toBe("/env");
      expect(config.server.port).toBe(7200);
    });

    it("merges partial configs over the defaults", () => {
      const merged = mergeConfigs({ server: { port: 1 } }, { export: { indent: 0 } });
      expect(merged.server.port).toBe(1);
      expect(merged.server.wsPath).toBe("/ws");
      expect(merged.export.indent).toBe(0);
      expect(DEFAULT_CONFIG.server.port).toBe(8080);
    });
  });

  describe("Edge Cases", () => {
    it("ignores unparseable numbers in the environment", () => {
      expect(configFromEnv({ REFLECTKIT_PORT: "eighty", REFLECTKIT_HOST: "" })).toEqual({ server: {}, export: {} });
    });

    it("rejects unknown file formats and missing files", () => {
      const file = path.join(dir, "config.toml");
      fs.writeFileSync(file, "port = 1\n");
      expect(() => configFromFile(file)).toThrow("Unsupported config file format: .toml");
      expect(() => configFromFile(path.join(dir, "missing.json"))).toThrow("Config file not found");
    });

    it("reports invalid settings", () => {
      const config = mergeConfigs({ server: { port: 70000, wsPath: "ws", refreshIntervalMs: 10 } });
      const result = validateConfig(config);

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual([
        "port must be an integer between 0 and 65535, got 70000",
        'wsPath must start with "/", got "ws"',
      ]);
      expect(result.warnings).toEqual(["refreshIntervalMs below 50ms will broadcast very frequently"]);
    });

    it("accepts the defaults", () => {
      expect(validateConfig(DEFAULT_CONFIG)).toEqual({ valid: true, errors: [], warnings: [] });
    });
  });
});
