/**
 * Tests for configuration loading and resolution
 */

import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { findConfig, loadConfig, parseConfig, resolveConfig } from "./config.js";
import type { ValuesemConfig } from "./types.js";

describe("Config", () => {
  describe("parseConfig", () => {
    it("should accept a complete config", () => {
      const result = parseConfig({
        tsconfig: "tsconfig.json",
        files: ["src/order.ts"],
        ignoreTypes: ["LegacyOrder"],
        warningsAsErrors: true,
        cycleGuard: "path",
        typeCheck: false,
      });

      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.tsconfig).to.equal("tsconfig.json");
        expect(result.value.files).to.deep.equal(["src/order.ts"]);
        expect(result.value.ignoreTypes).to.deep.equal(["LegacyOrder"]);
        expect(result.value.warningsAsErrors).to.equal(true);
        expect(result.value.cycleGuard).to.equal("path");
        expect(result.value.typeCheck).to.equal(false);
      }
    });

    it("should accept an empty object", () => {
      const result = parseConfig({});
      expect(result.ok).to.equal(true);
    });

    it("should reject non-objects", () => {
      expect(parseConfig([])).to.deep.equal({
        ok: false,
        error: "valuesem.json: expected a JSON object",
      });
    });

    it("should list every invalid field", () => {
      expect(
        parseConfig({ files: "src", cycleGuard: "depth", extra: 1 })
      ).to.deep.equal({
        ok: false,
        error: `valuesem.json: unknown field 'extra'; 'files' must be an array of strings; 'cycleGuard' must be "call" or "path"`,
      });
    });
  });

  describe("loadConfig and findConfig", () => {
    let tempDir = "";

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "valuesem-config-"));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it("should load a config file", () => {
      const configPath = path.join(tempDir, "valuesem.json");
      fs.writeFileSync(configPath, JSON.stringify({ ignoreTypes: ["Draft"] }));

      const result = loadConfig(configPath);

      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.ignoreTypes).to.deep.equal(["Draft"]);
      }
    });

    it("should report a missing config file", () => {
      const configPath = path.join(tempDir, "valuesem.json");
      expect(loadConfig(configPath)).to.deep.equal({
        ok: false,
        error: `Config file not found: ${configPath}`,
      });
    });

    it("should report invalid JSON", () => {
      const configPath = path.join(tempDir, "valuesem.json");
      fs.writeFileSync(configPath, "{ files: ");

      const result = loadConfig(configPath);

      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error).to.match(/^Failed to parse valuesem\.json: /);
      }
    });

    it("should find the config in a parent directory", () => {
      const configPath = path.join(tempDir, "valuesem.json");
      fs.writeFileSync(configPath, "{}");
      const nested = path.join(tempDir, "src", "orders");
      fs.mkdirSync(nested, { recursive: true });

      expect(findConfig(nested)).to.equal(configPath);
    });
  });

  describe("resolveConfig", () => {
    const projectRoot = path.resolve("/work/shop");

    it("should use defaults for an empty config", () => {
      const result = resolveConfig({}, {}, projectRoot);

      expect(result).to.deep.equal({
        ok: true,
        value: {
          projectRoot,
          tsconfigPath: undefined,
          files: [],
          ignoreTypes: [],
          warningsAsErrors: false,
          cycleGuard: "call",
          typeCheck: false,
          json: false,
          verbose: false,
          quiet: false,
        },
      });
    });

    it("should resolve config paths against the project root", () => {
      const config: ValuesemConfig = {
        tsconfig: "tsconfig.json",
        files: ["src/order.ts"],
      };

      const result = resolveConfig(config, {}, projectRoot);

      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.tsconfigPath).to.equal(
          path.join(projectRoot, "tsconfig.json")
        );
        expect(result.value.files).to.deep.equal([
          path.join(projectRoot, "src/order.ts"),
        ]);
      }
    });

    it("should resolve command line paths against the working directory", () => {
      const cwd = path.join(projectRoot, "packages", "api");
      const config: ValuesemConfig = {
        tsconfig: "tsconfig.json",
        files: ["src/order.ts"],
      };

      const result = resolveConfig(
        config,
        { project: "tsconfig.build.json" },
        projectRoot,
        ["src/invoice.ts"],
        cwd
      );

      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.tsconfigPath).to.equal(
          path.join(cwd, "tsconfig.build.json")
        );
        expect(result.value.files).to.deep.equal([
          path.join(cwd, "src/invoice.ts"),
        ]);
      }
    });

    it("should override config with CLI options", () => {
      const config: ValuesemConfig = {
        warningsAsErrors: false,
        cycleGuard: "call",
        typeCheck: false,
      };

      const result = resolveConfig(
        config,
        { warningsAsErrors: true, guard: "path", typeCheck: true, json: true },
        projectRoot
      );

      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.warningsAsErrors).to.equal(true);
        expect(result.value.cycleGuard).to.equal("path");
        expect(result.value.typeCheck).to.equal(true);
        expect(result.value.json).to.equal(true);
      }
    });

    it("should reject an unknown cycle guard", () => {
      expect(resolveConfig({}, { guard: "depth" }, projectRoot)).to.deep.equal({
        ok: false,
        error: `Invalid cycle guard 'depth' (expected "call" or "path")`,
      });
    });
  });
});
