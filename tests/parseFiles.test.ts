import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { dropPartialLine, parseIndexedFiles, parseSourceFile } from "../src/pipeline/parseFiles.js";
import type { Logger, StageLogEntry } from "../src/types.js";

class WarnRecorder implements Logger {
  readonly warnings: string[][] = [];

  async log(entry: StageLogEntry): Promise<void> {
    if (entry.event === "warn") {
      this.warnings.push(entry.warnings || []);
    }
  }

  async stageStart(): Promise<number> {
    return Date.now();
  }

  async stageEnd(): Promise<void> {}

  async stageError(): Promise<void> {}
}

test("parseSourceFile only parses the complete lines of a truncated read", async () => {
  const tmp = await fs.mkdtemp(path.join(os.tmpdir(), "importlens-truncate-"));
  try {
    const file = path.join(tmp, "big.py");
    await fs.writeFile(file, "import os\nimport numpy\n", "utf8");

    const report = await parseSourceFile(file, { strict: false, maxReadBytes: 19 });

    assert.deepEqual(
      report.statements.map((statement) => statement.stem),
      ["os"],
    );
    assert.deepEqual(report.errors, []);
    assert.equal(report.truncatedAt, 19);
  } finally {
    await fs.rm(tmp, { recursive: true, force: true });
  }
});

test("parseSourceFile leaves files under the limit untouched", async () => {
  const tmp = await fs.mkdtemp(path.join(os.tmpdir(), "importlens-untruncated-"));
  try {
    const file = path.join(tmp, "small.py");
    await fs.writeFile(file, "import os\nimport numpy", "utf8");

    const report = await parseSourceFile(file, { strict: false, maxReadBytes: 100 });

    assert.deepEqual(
      report.statements.map((statement) => statement.stem),
      ["os", "numpy"],
    );
    assert.equal(report.truncatedAt, undefined);
  } finally {
    await fs.rm(tmp, { recursive: true, force: true });
  }
});

test("parseIndexedFiles warns about and logs truncated files", async () => {
  const tmp = await fs.mkdtemp(path.join(os.tmpdir(), "importlens-truncate-index-"));
  try {
    await fs.writeFile(path.join(tmp, "big.py"), "import os\nimport numpy\n", "utf8");
    await fs.writeFile(path.join(tmp, "small.py"), "import sys\n", "utf8");
    const logger = new WarnRecorder();
    const index = ["big.py", "small.py"].map((relPath) => ({
      absPath: path.join(tmp, relPath),
      relPath,
      sizeBytes: 0,
      depth: 0,
    }));

    const { reports, warnings } = await parseIndexedFiles(index, { strict: false, maxReadBytes: 19, logger });

    assert.deepEqual(
      reports.map((report) => report.statements.map((statement) => statement.stem)),
      [["os"], ["sys"]],
    );
    assert.deepEqual(warnings, ["big.py: truncated at 19 bytes"]);
    assert.deepEqual(logger.warnings, [["big.py: truncated at 19 bytes"]]);
  } finally {
    await fs.rm(tmp, { recursive: true, force: true });
  }
});

test("dropPartialLine cuts after the last line break", () => {
  assert.equal(dropPartialLine("import os\r\nimport nu"), "import os\r\n");
  assert.equal(dropPartialLine("import os\n# \uFFFD"), "import os\n");
  assert.equal(dropPartialLine("import nu"), "");
});
