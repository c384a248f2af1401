import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { buildFileIndex } from "../src/scanner/fileIndexer.js";

async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [rel, text] of Object.entries(files)) {
    const abs = path.join(root, rel);
    await fs.mkdir(path.dirname(abs), { recursive: true });
    await fs.writeFile(abs, text, "utf8");
  }
}

test("file indexer finds python sources and skips excluded directories", async () => {
  const tmp = await fs.mkdtemp(path.join(os.tmpdir(), "il-index-"));
  try {
    await writeFiles(tmp, {
      "pkg/alpha.py": "import os\n",
      "pkg/beta.py": "import sys\n",
      "top.py": "import json\n",
      "notes.txt": "import nothing\n",
      ".venv/lib/site.py": "import hidden\n",
      "venv/lib/site.py": "import hidden\n",
      "__pycache__/cached.py": "import hidden\n",
      "deep/a/b/c.py": "import far\n",
    });

    const index = await buildFileIndex({ rootDir: tmp, maxDepth: 1, maxFiles: 50 });

    assert.deepEqual(
      index.map((entry) => entry.relPath),
      ["pkg/alpha.py", "pkg/beta.py", "top.py"],
    );
    assert.equal(index[2].depth, 0);
    assert.equal(index[2].sizeBytes, "import json\n".length);
  } finally {
    await fs.rm(tmp, { recursive: true, force: true });
  }
});

test("file indexer honours maxFiles and custom excludes", async () => {
  const tmp = await fs.mkdtemp(path.join(os.tmpdir(), "il-index-"));
  try {
    await writeFiles(tmp, {
      "pkg/alpha.py": "",
      "pkg/beta.py": "",
      "tools/gamma.py": "",
    });

    const limited = await buildFileIndex({ rootDir: tmp, maxDepth: 4, maxFiles: 1 });
    assert.equal(limited.length, 1);

    const custom = await buildFileIndex({ rootDir: tmp, maxDepth: 4, maxFiles: 50, excludeDirs: ["pkg"] });
    assert.deepEqual(
      custom.map((entry) => entry.relPath),
      ["tools/gamma.py"],
    );
  } finally {
    await fs.rm(tmp, { recursive: true, force: true });
  }
});
