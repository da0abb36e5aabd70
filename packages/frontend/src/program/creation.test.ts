/**
 * Tests for program creation
 */

import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { createProgram, readTsConfig } from "./creation.js";

describe("Program Creation", () => {
  let tempDir = "";

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "valuesem-creation-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  const writeSource = (relative: string, contents: string): string => {
    const filePath = path.join(tempDir, relative);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, contents);
    return filePath;
  };

  it("should create a program from explicit files", () => {
    const entry = writeSource("src/order.ts", "export const id = 1;\n");

    const result = createProgram({ files: ["src/order.ts"], cwd: tempDir });

    expect(result.ok).to.equal(true);
    if (result.ok) {
      expect(result.value.sourceFiles.map((sf) => sf.fileName)).to.deep.equal(
        [entry.split(path.sep).join("/")]
      );
    }
  });

  it("should take the file list from tsconfig.json", () => {
    writeSource("src/a.ts", "export const a = 1;\n");
    writeSource("src/b.ts", "export const b = 2;\n");
    writeSource("src/types.d.ts", "export declare const c: number;\n");
    writeSource(
      "tsconfig.json",
      JSON.stringify({
        compilerOptions: { strict: true, types: [] },
        include: ["src/**/*.ts"],
      })
    );

    const result = createProgram({ tsconfigPath: "tsconfig.json", cwd: tempDir });

    expect(result.ok).to.equal(true);
    if (result.ok) {
      expect(
        result.value.sourceFiles.map((sf) => path.basename(sf.fileName)).sort()
      ).to.deep.equal(["a.ts", "b.ts"]);
    }
  });

  it("should prefer explicit files over the tsconfig file list", () => {
    writeSource("src/a.ts", "export const a = 1;\n");
    writeSource("src/b.ts", "export const b = 2;\n");
    writeSource(
      "tsconfig.json",
      JSON.stringify({ compilerOptions: { types: [] }, include: ["src"] })
    );

    const result = createProgram({
      tsconfigPath: "tsconfig.json",
      files: ["src/b.ts"],
      cwd: tempDir,
    });

    expect(result.ok).to.equal(true);
    if (result.ok) {
      expect(
        result.value.sourceFiles.map((sf) => path.basename(sf.fileName))
      ).to.deep.equal(["b.ts"]);
    }
  });

  it("should force strictNullChecks on projects from tsconfig.json", () => {
    writeSource(
      "tsconfig.json",
      JSON.stringify({ compilerOptions: { strict: false }, include: ["src"] })
    );

    const result = readTsConfig(path.join(tempDir, "tsconfig.json"));

    expect(result.ok).to.equal(true);
    if (result.ok) {
      expect(result.value.options.strictNullChecks).to.equal(true);
      expect(result.value.options.noEmit).to.equal(true);
    }
  });

  it("should report a missing tsconfig.json", () => {
    const result = createProgram({
      tsconfigPath: "missing/tsconfig.json",
      cwd: tempDir,
    });

    expect(result.ok).to.equal(false);
    if (!result.ok) {
      expect(result.error.diagnostics.map((d) => d.code)).to.deep.equal([
        "RVS9001",
      ]);
    }
  });

  it("should report an unreadable tsconfig.json", () => {
    writeSource("tsconfig.json", "{ \"compilerOptions\": ");

    const result = createProgram({ tsconfigPath: "tsconfig.json", cwd: tempDir });

    expect(result.ok).to.equal(false);
    if (!result.ok) {
      expect(result.error.hasErrors).to.equal(true);
      expect(result.error.diagnostics[0]?.code).to.be.oneOf([
        "RVS9002",
        "RVS9003",
      ]);
    }
  });

  it("should report when there is nothing to analyze", () => {
    const result = createProgram({ cwd: tempDir });

    expect(result.ok).to.equal(false);
    if (!result.ok) {
      expect(result.error.diagnostics.map((d) => d.code)).to.deep.equal([
        "RVS9004",
      ]);
    }
  });

  it("should report missing source files", () => {
    const result = createProgram({ files: ["src/gone.ts"], cwd: tempDir });

    expect(result.ok).to.equal(false);
    if (!result.ok) {
      expect(result.error.diagnostics.map((d) => d.message)).to.deep.equal([
        `Source file not found: ${path.join(tempDir, "src/gone.ts")}`,
      ]);
    }
  });
});
