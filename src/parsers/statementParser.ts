import { ImportParseError } from "../errors.js";
import type { ImportLeaf, ImportStatement } from "../types.js";
import { listSplit, splitDots } from "../utils/split.js";
import { createFromImport, createLeaf, createPlainImport } from "./statements.js";
import { isComma, isKeyword, type Token } from "./token.js";

interface NameClause {
  name: string;
  alias?: string;
}

interface Segment {
  words: string[];
  comments: Token[];
}

export function parseImportTokens(tokens: readonly Token[], lineNumbers: readonly number[]): ImportStatement[] {
  const [keyword, ...rest] = tokens;

  if (keyword && isKeyword(keyword, "import")) {
    return parsePlainForm(rest, lineNumbers);
  }
  if (keyword && isKeyword(keyword, "from")) {
    return [parseFromForm(rest, lineNumbers)];
  }

  const found = keyword ? `"${keyword.text}"` : "nothing";
  throw new ImportParseError(`expected "import" or "from" but found ${found}`, lineNumbers);
}

/**
 * Builds the record for one `import` stem. Relative stems fold their last
 * path segment into a leaf before any alias is looked at, so
 * `import .foo.bar as bar` ends up as `from .foo import bar`.
 */
export function parseImportStem(
  clause: NameClause,
  lineNumbers: readonly number[],
  comments: readonly Token[] = [],
): ImportStatement {
  const { name, alias } = clause;

  if (name.startsWith(".")) {
    const [dots, remainder] = splitDots(name);
    const cut = remainder.lastIndexOf(".");
    const base = cut >= 0 ? remainder.slice(0, cut) : "";
    const leafName = cut >= 0 ? remainder.slice(cut + 1) : remainder;
    if (!leafName) {
      throw new ImportParseError(`relative import "${name}" names no module`, lineNumbers);
    }
    return createFromImport(`${dots}${base}`, [createLeaf(leafName, alias)], lineNumbers, comments);
  }

  const cut = name.lastIndexOf(".");
  if (alias && cut >= 0 && name.slice(cut + 1) === alias) {
    return createFromImport(name.slice(0, cut), [createLeaf(alias)], lineNumbers, comments);
  }

  return createPlainImport(name, alias, lineNumbers, comments);
}

function parsePlainForm(tokens: readonly Token[], lineNumbers: readonly number[]): ImportStatement[] {
  const drafts: Array<{ clause: NameClause; comments: Token[] }> = [];
  let pending: Token[] = [];

  for (const segment of splitSegments(tokens)) {
    if (segment.words.length === 0) {
      const last = drafts.length > 0 ? drafts[drafts.length - 1] : undefined;
      if (last) {
        last.comments.push(...segment.comments);
      } else {
        pending.push(...segment.comments);
      }
      continue;
    }
    drafts.push({
      clause: readNameClause(segment.words, lineNumbers),
      comments: [...pending, ...segment.comments],
    });
    pending = [];
  }

  if (drafts.length === 0) {
    throw new ImportParseError("import statement names no module", lineNumbers);
  }

  return drafts.map((draft) => parseImportStem(draft.clause, lineNumbers, draft.comments));
}

function parseFromForm(tokens: readonly Token[], lineNumbers: readonly number[]): ImportStatement {
  const parts = listSplit(tokens, (token) => isKeyword(token, "import"));
  if (parts.length !== 2) {
    const reason = parts.length < 2 ? 'missing "import" after "from"' : 'more than one "import" after "from"';
    throw new ImportParseError(reason, lineNumbers);
  }

  const [stemTokens, leafTokens] = parts;
  const stem = stemTokens.find((token) => !token.isComment);
  if (!stem) {
    throw new ImportParseError('missing module path after "from"', lineNumbers);
  }

  const comments = stemTokens.filter((token) => token.isComment);
  const leafs: ImportLeaf[] = [];

  for (const segment of splitSegments(leafTokens)) {
    if (segment.words.length === 0) {
      comments.push(...segment.comments);
      continue;
    }
    const clause = readNameClause(segment.words, lineNumbers);
    leafs.push(createLeaf(clause.name, clause.alias, segment.comments));
  }

  if (leafs.length === 0) {
    throw new ImportParseError(`"from ${stem.text} import" names nothing`, lineNumbers);
  }

  return createFromImport(stem.text, leafs, lineNumbers, comments);
}

function splitSegments(tokens: readonly Token[]): Segment[] {
  return listSplit(tokens, isComma).map((segment) => ({
    words: segment.filter((token) => !token.isComment).map((token) => token.text),
    comments: segment.filter((token) => token.isComment),
  }));
}

function readNameClause(words: string[], lineNumbers: readonly number[]): NameClause {
  if (words.length === 1) {
    return { name: words[0] };
  }
  if (words.length === 3 && words[1] === "as") {
    return { name: words[0], alias: words[2] };
  }
  throw new ImportParseError(`cannot read "${words.join(" ")}" as an imported name`, lineNumbers);
}
