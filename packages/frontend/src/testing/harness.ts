/**
 * Test harness for frontend tests.
 * Writes source files to a temporary directory and creates a real program
 * over them.
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { createProgram } from "../program/creation.js";
import type { FrontendOptions, RecnameProgram } from "../program/types.js";

export type TestHarness = {
  readonly root: string;
  readonly program: RecnameProgram;
  readonly cleanup: () => void;
};

/**
 * @param files - Paths relative to the temporary root, in program order
 */
export const createTestHarness = (
  files: Readonly<Record<string, string>>,
  options: Partial<FrontendOptions> = {}
): TestHarness => {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "recname-test-"));
  const cleanup = () => {
    fs.rmSync(root, { recursive: true, force: true });
  };

  const filePaths = Object.entries(files).map(([relativePath, content]) => {
    const filePath = path.join(root, relativePath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
    return filePath;
  });

  const result = createProgram(filePaths, {
    sourceRoot: root,
    rootNamespace: "com.example",
    ...options,
  });

  if (!result.ok) {
    cleanup();
    throw new Error(
      `Failed to create test program: ${result.error.diagnostics
        .map((d) => d.message)
        .join("; ")}`
    );
  }

  return { root, program: result.value, cleanup };
};
