import type { FromImport, ImportLeaf, ImportStatement, LineSeparator, PlainImport } from "../types.js";
import type { Token } from "./token.js";

export interface FormatOptions {
  sep?: LineSeparator;
  indent?: string;
}

export function createLeaf(name: string, alias?: string, comments: readonly Token[] = []): ImportLeaf {
  const leaf: ImportLeaf = {
    name,
    comments: Object.freeze([...comments]),
    ...(alias && alias !== name ? { alias } : {}),
  };
  return Object.freeze(leaf);
}

export function createPlainImport(
  stem: string,
  alias: string | undefined,
  lineNumbers: readonly number[],
  comments: readonly Token[] = [],
): PlainImport {
  const statement: PlainImport = {
    kind: "import",
    stem,
    lineNumbers: Object.freeze([...lineNumbers]),
    comments: Object.freeze([...comments]),
    ...(alias && alias !== stem ? { alias } : {}),
  };
  return Object.freeze(statement);
}

export function createFromImport(
  stem: string,
  leafs: readonly ImportLeaf[],
  lineNumbers: readonly number[],
  comments: readonly Token[] = [],
): FromImport {
  const statement: FromImport = {
    kind: "from",
    stem,
    leafs: Object.freeze([...leafs]),
    lineNumbers: Object.freeze([...lineNumbers]),
    comments: Object.freeze([...comments]),
  };
  return Object.freeze(statement);
}

export function formatName(name: string, alias?: string): string {
  return alias ? `${name} as ${alias}` : name;
}

/**
 * Reassembles a statement as Python source. Statements carrying any comment
 * below statement level are written in parenthesized form, one leaf per line,
 * so that the comments land back on the same leaf when the text is parsed
 * again.
 *
 * A plain import has nowhere to put a second comment: its comments are joined
 * after the statement and read back as a single comment, so a parsed plain
 * import carries at most one.
 */
export function formatStatement(statement: ImportStatement, options: FormatOptions = {}): string {
  const sep = options.sep ?? "\n";
  const indent = options.indent ?? "    ";

  if (statement.kind === "import") {
    return withComments(`import ${formatName(statement.stem, statement.alias)}`, statement.comments);
  }

  const hasComments =
    statement.comments.length > 0 || statement.leafs.some((leaf) => leaf.comments.length > 0);

  if (!hasComments) {
    const names = statement.leafs.map((leaf) => formatName(leaf.name, leaf.alias));
    return `from ${statement.stem} import ${names.join(", ")}`;
  }

  const lines = [`from ${statement.stem} import (`];
  for (const leaf of statement.leafs) {
    const leading = leaf.comments.slice(0, -1);
    const trailing = leaf.comments.slice(-1);
    for (const comment of leading) {
      lines.push(`${indent}${comment.text}`);
    }
    lines.push(withComments(`${indent}${formatName(leaf.name, leaf.alias)},`, trailing));
  }
  for (const comment of statement.comments) {
    lines.push(`${indent}${comment.text}`);
  }
  lines.push(")");

  return lines.join(sep);
}

/** Names a statement brings into scope, as written after `import`. */
export function importedNames(statement: ImportStatement): string[] {
  if (statement.kind === "import") {
    return [formatName(statement.stem, statement.alias)];
  }
  return statement.leafs.map((leaf) => formatName(leaf.name, leaf.alias));
}

export function statementComments(statement: ImportStatement): string[] {
  const leafComments = statement.kind === "from" ? statement.leafs.flatMap((leaf) => leaf.comments) : [];
  return [...statement.comments, ...leafComments].map((comment) => comment.text);
}

function withComments(text: string, comments: readonly Token[]): string {
  if (comments.length === 0) {
    return text;
  }
  return `${text}  ${comments.map((comment) => comment.text).join(" ")}`;
}
