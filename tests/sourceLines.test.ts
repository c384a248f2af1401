import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { detectLineSeparator, enumerateLines, getFileArtifacts } from "../src/parsers/sourceLines.js";

test("enumerateLines numbers lines from 1 across mixed terminators", () => {
  assert.deepEqual([...enumerateLines("a\nb\r\nc\rd\n")], [
    [1, "a"],
    [2, "b"],
    [3, "c"],
    [4, "d"],
  ]);
  assert.deepEqual([...enumerateLines("a\n\nb")], [
    [1, "a"],
    [2, ""],
    [3, "b"],
  ]);
  assert.deepEqual([...enumerateLines("")], []);
});

test("detectLineSeparator looks at the first line of multi-line text", () => {
  assert.equal(detectLineSeparator("a\r\nb\r\n"), "\r\n");
  assert.equal(detectLineSeparator("a\r\n"), "\n");
  assert.equal(detectLineSeparator("a\nb\r\n"), "\n");
  assert.equal(detectLineSeparator("abc"), "\n");
});

test("getFileArtifacts reads the separator from disk", async () => {
  const tmp = await fs.mkdtemp(path.join(os.tmpdir(), "il-artifacts-"));
  try {
    const crlf = path.join(tmp, "crlf.py");
    const lf = path.join(tmp, "lf.py");
    await fs.writeFile(crlf, "import os\r\nimport sys\r\n", "utf8");
    await fs.writeFile(lf, "import os\nimport sys\n", "utf8");

    assert.deepEqual(await getFileArtifacts(crlf), { sep: "\r\n" });
    assert.deepEqual(await getFileArtifacts(lf), { sep: "\n" });
  } finally {
    await fs.rm(tmp, { recursive: true, force: true });
  }
});
