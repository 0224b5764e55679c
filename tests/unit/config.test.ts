import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { loadConfig, readEnv } from "../../src/config";
import { log } from "../../src/utils/logger";

describe("config.ts", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "pretty-axios-logger-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  describe("loadConfig", () => {
    it("should apply defaults", () => {
      const cfg = loadConfig({}, {});

      expect(cfg.request).toBe(true);
      expect(cfg.requestHeader).toBe(false);
      expect(cfg.requestBody).toBe(false);
      expect(cfg.responseHeader).toBe(false);
      expect(cfg.responseBody).toBe(true);
      expect(cfg.error).toBe(true);
      expect(cfg.maxWidth).toBe(90);
      expect(cfg.compact).toBe(true);
      expect(cfg.enabled).toBe(true);
      expect(cfg.logLevel).toBeUndefined();
      expect(cfg.colors.request).toBe("reset");
    });

    it("should let environment override the rc file and options override both", () => {
      const rc = path.join(tempDir, "logger.yml");
      fs.writeFileSync(rc, "maxWidth: 60\ncompact: false\nresponseHeader: true\n");

      const env = {
        PRETTY_AXIOS_LOGGER_RC: rc,
        PRETTY_AXIOS_LOGGER_MAX_WIDTH: "70",
      };

      const fromEnv = loadConfig({}, env);
      expect(fromEnv.maxWidth).toBe(70);
      expect(fromEnv.compact).toBe(false);
      expect(fromEnv.responseHeader).toBe(true);

      const fromUser = loadConfig({ maxWidth: 80, compact: undefined }, env);
      expect(fromUser.maxWidth).toBe(80);
      expect(fromUser.compact).toBe(false);
    });

    it("should ignore a missing rc file", () => {
      const cfg = loadConfig(
        {},
        { PRETTY_AXIOS_LOGGER_RC: path.join(tempDir, "absent.yml") }
      );

      expect(cfg.maxWidth).toBe(90);
    });

    it("should warn about and ignore an unparsable rc file", () => {
      const warn = vi.spyOn(log, "warn").mockImplementation(() => {});
      const rc = path.join(tempDir, "broken.yml");
      fs.writeFileSync(rc, "maxWidth: [unclosed\n");

      const cfg = loadConfig({}, { PRETTY_AXIOS_LOGGER_RC: rc });

      expect(cfg.maxWidth).toBe(90);
      expect(warn).toHaveBeenCalledTimes(1);
    });

    it("should fall back to defaultColor per section", () => {
      const cfg = loadConfig({ defaultColor: "cyan", errorColor: "red" }, {});

      expect(cfg.colors.error).toBe("red");
      expect(cfg.colors.request).toBe("cyan");
      expect(cfg.colors.responseStatus).toBe("cyan");
    });

    it("should pass functions through", () => {
      const logPrint = vi.fn();
      const clock = () => 5;

      const cfg = loadConfig({ logPrint, clock }, {});

      expect(cfg.logPrint).toBe(logPrint);
      expect(cfg.clock).toBe(clock);
      expect(cfg.filter).toBeUndefined();
    });

    it("should reject a non-positive maxWidth", () => {
      expect(() => loadConfig({ maxWidth: 0 }, {})).toThrow(
        "PrettyAxiosLogger: invalid options: maxWidth: Number must be greater than 0"
      );
    });

    it("should reject malformed environment values", () => {
      expect(() =>
        loadConfig({}, { PRETTY_AXIOS_LOGGER_ENABLED: "maybe" })
      ).toThrow(/enabled: Expected boolean, received string/);
      expect(() =>
        loadConfig({}, { PRETTY_AXIOS_LOGGER_MAX_WIDTH: "wide" })
      ).toThrow(/maxWidth: Expected number, received nan/);
    });
  });

  describe("readEnv", () => {
    it("should parse flags and numbers", () => {
      expect(
        readEnv({
          PRETTY_AXIOS_LOGGER_ENABLED: "0",
          PRETTY_AXIOS_LOGGER_COMPACT: "TRUE",
          PRETTY_AXIOS_LOGGER_MAX_WIDTH: "120",
          PRETTY_AXIOS_LOGGER_LOG_LEVEL: "debug",
        })
      ).toEqual({
        enabled: false,
        compact: true,
        maxWidth: 120,
        logLevel: "debug",
      });
    });

    it("should skip unset variables", () => {
      expect(readEnv({})).toEqual({});
    });
  });
});
