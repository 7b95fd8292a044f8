/**
 * Tests for resolve command
 */

import { describe, it, afterEach } from "mocha";
import { expect } from "chai";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { createTypeDescriptor, noOverrides } from "@recname/core";
import type { RecordNameEntry } from "@recname/frontend";
import type { ResolvedConfig } from "../types.js";
import {
  RecordNameRow,
  collectSourceFiles,
  formatRows,
  resolveRecords,
  toRow,
} from "./resolve.js";

describe("Resolve Command", () => {
  let tmpDir: string | undefined;

  afterEach(() => {
    if (tmpDir) {
      fs.rmSync(tmpDir, { recursive: true, force: true });
      tmpDir = undefined;
    }
  });

  const makeProject = (files: Readonly<Record<string, string>>): string => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "recname-resolve-"));
    tmpDir = dir;
    for (const [relativePath, content] of Object.entries(files)) {
      const filePath = path.join(dir, relativePath);
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      fs.writeFileSync(filePath, content);
    }
    return dir;
  };

  const configFor = (
    projectRoot: string,
    overrides: Partial<ResolvedConfig> = {}
  ): ResolvedConfig => ({
    rootNamespace: "com.acme",
    projectRoot,
    sourceRoot: path.join(projectRoot, "src"),
    entryPoints: [],
    exportedOnly: false,
    json: false,
    verbose: false,
    quiet: true,
    ...overrides,
  });

  describe("collectSourceFiles", () => {
    it("should find TypeScript sources in sorted order", () => {
      const dir = makeProject({
        "src/b.ts": "",
        "src/a/c.tsx": "",
        "src/types.d.ts": "",
        "src/readme.md": "",
        "src/node_modules/dep/index.ts": "",
      });

      expect(collectSourceFiles(path.join(dir, "src"))).to.deep.equal([
        path.join(dir, "src", "a", "c.tsx"),
        path.join(dir, "src", "b.ts"),
      ]);
    });

    it("should return nothing for a missing directory", () => {
      expect(collectSourceFiles("/nonexistent/src")).to.deep.equal([]);
    });
  });

  describe("toRow", () => {
    it("should render the declaration without its owner", () => {
      const entry: RecordNameEntry = {
        kind: "class",
        location: { file: "/project/src/models/pair.ts", line: 3, column: 1, length: 10 },
        descriptor: createTypeDescriptor("Pair", "com.acme.models", [
          createTypeDescriptor("A"),
          createTypeDescriptor("B"),
        ]),
        overrides: noOverrides,
        resolved: {
          namespace: "com.acme.models",
          name: "Pair__A_B",
          fullName: "com.acme.models.Pair__A_B",
        },
      };

      expect(toRow(entry, "/project")).to.deep.equal({
        file: "src/models/pair.ts",
        line: 3,
        declaration: "Pair<A, B>",
        namespace: "com.acme.models",
        name: "Pair__A_B",
        fullName: "com.acme.models.Pair__A_B",
      });
    });
  });

  describe("formatRows", () => {
    it("should align locations after the longest full name", () => {
      const rows: readonly RecordNameRow[] = [
        {
          file: "src/a.ts",
          line: 1,
          declaration: "A",
          namespace: "x",
          name: "A",
          fullName: "x.A",
        },
        {
          file: "src/b.ts",
          line: 2,
          declaration: "Long",
          namespace: "x.y",
          name: "Long",
          fullName: "x.y.Long",
        },
      ];

      expect(formatRows(rows)).to.deep.equal([
        "x.A       src/a.ts:1  A",
        "x.y.Long  src/b.ts:2  Long",
      ]);
    });

    it("should format nothing for no rows", () => {
      expect(formatRows([])).to.deep.equal([]);
    });
  });

  describe("resolveRecords", () => {
    it("should resolve every file under the source root", () => {
      const dir = makeProject({
        "src/models/pair.ts": "export class Pair<A, B> {}\n",
        "src/index.ts": "export interface Point { x: number }\n",
      });

      const result = resolveRecords(configFor(dir));
      expect(result).to.deep.equal({
        ok: true,
        value: [
          {
            file: "src/index.ts",
            line: 1,
            declaration: "Point",
            namespace: "com.acme",
            name: "Point",
            fullName: "com.acme.Point",
          },
          {
            file: "src/models/pair.ts",
            line: 1,
            declaration: "Pair<A, B>",
            namespace: "com.acme.models",
            name: "Pair__A_B",
            fullName: "com.acme.models.Pair__A_B",
          },
        ],
      });
    });

    it("should resolve only the entry points when given", () => {
      const dir = makeProject({
        "src/a.ts": "export class A {}\n",
        "src/b.ts": "export class B {}\n",
      });

      const result = resolveRecords(
        configFor(dir, { entryPoints: [path.join(dir, "src", "b.ts")] })
      );
      expect(result.ok && result.value.map((r) => r.fullName)).to.deep.equal([
        "com.acme.B",
      ]);
    });

    it("should fail when there are no sources", () => {
      const dir = makeProject({ "src/readme.md": "" });

      expect(resolveRecords(configFor(dir))).to.deep.equal({
        ok: false,
        error: `No TypeScript files found in ${path.join(dir, "src")}`,
      });
    });

    it("should report a missing entry point", () => {
      const dir = makeProject({});

      const result = resolveRecords(
        configFor(dir, { entryPoints: [path.join(dir, "src", "missing.ts")] })
      );
      expect(result.ok).to.be.false;
      if (!result.ok) {
        expect(result.error).to.include("RN2002");
      }
    });
  });
});
