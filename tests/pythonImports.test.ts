import test from "node:test";
import assert from "node:assert/strict";
import { ImportParseError } from "../src/errors.js";
import { listImportedModules, parsePythonImports, parseStatements } from "../src/parsers/pythonImports.js";
import { formatStatement } from "../src/parsers/statements.js";
import type { ImportStatement } from "../src/types.js";

function semantic(statement: ImportStatement): unknown {
  const comments = statement.comments.map((c) => c.text);
  if (statement.kind === "import") {
    return { kind: statement.kind, stem: statement.stem, alias: statement.alias, comments };
  }
  return {
    kind: statement.kind,
    stem: statement.stem,
    leafs: statement.leafs.map((leaf) => ({
      name: leaf.name,
      alias: leaf.alias,
      comments: leaf.comments.map((c) => c.text),
    })),
    comments,
  };
}

test("listImportedModules extracts import and from-import modules", () => {
  const source = `
import os, sys as s
from fastapi import FastAPI
from .core import app
# import ignored
`;

  const { statements, errors } = parsePythonImports(source);
  assert.deepEqual(errors, []);
  assert.deepEqual(listImportedModules(statements), ["os", "sys", "fastapi", ".core"]);
  assert.deepEqual(
    statements.map((statement) => statement.lineNumbers),
    [[2], [2], [3], [4]],
  );
});

test("parsePythonImports skips block comments and handles CRLF", () => {
  const source = '"""Module docstring\r\nimport fake\r\n"""\r\nimport real\r\n';
  const { statements } = parsePythonImports(source);
  assert.deepEqual(statements.map(semantic), [{ kind: "import", stem: "real", alias: undefined, comments: [] }]);
  assert.deepEqual(statements[0].lineNumbers, [4]);
});

test("parsePythonImports records unparseable groups and keeps going", () => {
  const { statements, errors } = parsePythonImports("from a import b\nfrom broken\nimport c\n");
  assert.deepEqual(listImportedModules(statements), ["a", "c"]);
  assert.deepEqual(errors, [{ lineNumbers: [2], message: 'missing "import" after "from" (line 2)' }]);
});

test("parsePythonImports in strict mode rethrows the parse error", () => {
  assert.throws(() => parsePythonImports("from broken\n", { strict: true }), ImportParseError);
});

test("parseStatements parses pre-grouped lines", () => {
  const statements = [...parseStatements([{ lines: ["import os, sys"], lineNumbers: [9] }])];
  assert.deepEqual(listImportedModules(statements), ["os", "sys"]);
});

test("formatting and parsing again keeps stems, leafs, aliases and comments", () => {
  const source = [
    "import os, sys  # comment",
    "from a.b import c as c, d as e",
    "from a import (b,  # keep",
    "    c)",
    "import .foo.bar",
    "from . import bar",
    "import foo as foo",
    "import numpy as np",
    "from pkg import (",
    "    # about x",
    "    x,  # x note",
    "    y,",
    "    # trailing",
    ")",
    "",
  ].join("\n");

  const first = parsePythonImports(source, { strict: true }).statements;
  const rendered = first.map((statement) => formatStatement(statement)).join("\n");
  const second = parsePythonImports(rendered, { strict: true }).statements;

  assert.equal(first.length, 9);
  assert.deepEqual(second.map(semantic), first.map(semantic));
  assert.deepEqual(semantic(first[8]), {
    kind: "from",
    stem: "pkg",
    leafs: [
      { name: "x", alias: undefined, comments: ["# about x", "# x note"] },
      { name: "y", alias: undefined, comments: [] },
    ],
    comments: ["# trailing"],
  });
});
