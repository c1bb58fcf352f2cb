export type YamlValue = string | number | null | { [key: string]: YamlValue };

export interface YamlMapping {
  [key: string]: YamlValue;
}

export type YamlOrderedMapping =
  | ReadonlyMap<string, YamlNode>
  | { readonly [key: string]: YamlNode };

/** Anything `stringifyYaml` can write. */
export type YamlNode = string | number | null | YamlOrderedMapping;

interface YamlLine {
  indent: number;
  text: string;
  lineNo: number;
}

class YamlSubsetParser {
  private idx = 0;

  constructor(
    private readonly lines: YamlLine[],
    private readonly source: string
  ) {}

  parse(): YamlValue {
    const first = this.lines[0];
    if (!first) {
      return {};
    }

    const value = this.parseNode(first.indent);

    const line = this.peek();
    if (line) {
      throw new Error(`${this.source}:${line.lineNo} unexpected content '${line.text}'`);
    }

    return value;
  }

  private parseNode(indent: number): YamlValue {
    const current = this.peek();
    if (!current) {
      throw new Error(`${this.source}: unexpected EOF`);
    }
    if (current.indent !== indent) {
      throw new Error(`${this.source}:${current.lineNo} invalid indentation for '${current.text}'`);
    }
    if (!this.looksLikeKeyValue(current.text)) {
      this.idx += 1;
      return this.parseScalar(current.text, current.lineNo);
    }
    return this.parseMapping(indent);
  }

  private parseMapping(indent: number): YamlMapping {
    const out: YamlMapping = {};

    while (true) {
      const line = this.peek();
      if (!line || line.indent < indent) {
        return out;
      }
      if (line.indent > indent) {
        throw new Error(`${this.source}:${line.lineNo} invalid indentation for '${line.text}'`);
      }

      const { key, rest } = this.parseKeyValue(line.text, line.lineNo);
      this.idx += 1;

      if (Object.prototype.hasOwnProperty.call(out, key)) {
        throw new Error(`${this.source}:${line.lineNo} duplicate key '${key}'`);
      }

      if (rest === "") {
        const nested = this.peek();
        out[key] = nested && nested.indent > indent ? this.parseNode(nested.indent) : null;
      } else {
        out[key] = this.parseScalar(rest, line.lineNo);
      }
    }
  }

  private looksLikeKeyValue(value: string): boolean {
    return this.findKeySeparator(value) > 0;
  }

  // Index of the ':' ending the key, honouring a quoted key.
  private findKeySeparator(value: string): number {
    const quote = value[0];
    if (quote === '"' || quote === "'") {
      const close = value.indexOf(quote, 1);
      if (close < 0 || value[close + 1] !== ":") {
        return -1;
      }
      return close + 1;
    }

    const match = /:(?:\s|$)/.exec(value);
    return match ? match.index : -1;
  }

  private parseKeyValue(value: string, lineNo: number): { key: string; rest: string } {
    const idx = this.findKeySeparator(value);
    if (idx <= 0) {
      throw new Error(`${this.source}:${lineNo} expected 'key: value'`);
    }

    const rawKey = value.slice(0, idx).trim();
    const rest = value.slice(idx + 1).trim();
    const key = isQuoted(rawKey) ? unquote(rawKey, this.source, lineNo) : rawKey;
    if (key === "") {
      throw new Error(`${this.source}:${lineNo} empty key is not allowed`);
    }
    return { key, rest };
  }

  private parseScalar(value: string, lineNo: number): YamlValue {
    const trimmed = value.trim();

    if (trimmed === "{}") {
      return {};
    }
    if (isQuoted(trimmed)) {
      return unquote(trimmed, this.source, lineNo);
    }
    if (trimmed === "null" || trimmed === "~") {
      return null;
    }
    if (/^-?\d+(?:\.\d+)?$/.test(trimmed)) {
      return Number(trimmed);
    }
    if (trimmed === "") {
      throw new Error(`${this.source}:${lineNo} empty scalar is not allowed`);
    }
    return trimmed;
  }

  private peek(): YamlLine | undefined {
    return this.lines[this.idx];
  }
}

function isQuoted(value: string): boolean {
  return (
    value.length >= 2 &&
    ((value.startsWith('"') && value.endsWith('"')) ||
      (value.startsWith("'") && value.endsWith("'")))
  );
}

function unquote(value: string, source: string, lineNo: number): string {
  if (value.startsWith("'")) {
    return value.slice(1, -1).replace(/''/g, "'");
  }
  try {
    const parsed: unknown = JSON.parse(value);
    if (typeof parsed === "string") {
      return parsed;
    }
  } catch {
    // fall through to the error below
  }
  throw new Error(`${source}:${lineNo} invalid double-quoted string ${value}`);
}

function stripBom(value: string): string {
  return value.charCodeAt(0) === 0xfeff ? value.slice(1) : value;
}

function stripComment(line: string): string {
  let quote: string | undefined;
  for (let i = 0; i < line.length; i += 1) {
    const ch = line[i];
    if (quote) {
      if (ch === "\\" && quote === '"') {
        i += 1;
      } else if (ch === quote) {
        quote = undefined;
      }
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === "#" && (i === 0 || /\s/.test(line[i - 1] ?? ""))) {
      return line.slice(0, i);
    }
  }
  return line;
}

function toYamlLines(raw: string, source: string): YamlLine[] {
  const lines = stripBom(raw).split(/\r?\n/);
  const out: YamlLine[] = [];

  for (let i = 0; i < lines.length; i += 1) {
    const lineNo = i + 1;
    const line = lines[i] ?? "";
    if (/^\s*---\s*$/.test(line)) {
      continue;
    }

    const noComment = stripComment(line);
    const trimmed = noComment.trim();
    if (trimmed === "") {
      continue;
    }
    if (/^ *\t/.test(noComment)) {
      throw new Error(`${source}:${lineNo} tab indentation is not supported`);
    }

    if (trimmed === "-" || trimmed.startsWith("- ")) {
      throw new Error(`${source}:${lineNo} sequences are not supported`);
    }

    const indent = noComment.length - noComment.trimStart().length;
    out.push({
      indent,
      text: noComment.trimEnd().slice(indent),
      lineNo,
    });
  }

  return out;
}

export function parseYaml(raw: string, source = "<yaml>"): YamlValue {
  const parser = new YamlSubsetParser(toYamlLines(raw, source), source);
  return parser.parse();
}

const PLAIN_SCALAR = /^[A-Za-z0-9_./~+-][A-Za-z0-9_./~+@-]*$/;

function formatString(value: string): string {
  if (
    PLAIN_SCALAR.test(value) &&
    value !== "~" &&
    value !== "-" &&
    !/^(?:true|false|null)$/.test(value) &&
    !/^-?\d+(?:\.\d+)?$/.test(value)
  ) {
    return value;
  }
  return JSON.stringify(value);
}

function formatScalar(value: string | number | null): string {
  if (value === null) {
    return "null";
  }
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new Error(`YAML_EMIT_ERROR cannot encode number ${String(value)}`);
    }
    return String(value);
  }
  return formatString(value);
}

// Integer-like mapping keys stay bare so revision numbers read like the registry shows them.
function formatKey(key: string): string {
  return /^\d+$/.test(key) ? key : formatString(key);
}

function isScalar(value: YamlNode): value is string | number | null {
  return value === null || typeof value !== "object";
}

function isOrderedMap(value: YamlOrderedMapping): value is ReadonlyMap<string, YamlNode> {
  return value instanceof Map;
}

function entriesOf(value: YamlOrderedMapping): [string, YamlNode][] {
  return isOrderedMap(value) ? [...value.entries()] : Object.entries(value);
}

function emptyLiteral(value: YamlNode): string | null {
  if (isScalar(value)) {
    return null;
  }
  return entriesOf(value).length === 0 ? "{}" : null;
}

function emitNode(value: YamlNode, indent: number, out: string[]): void {
  const pad = " ".repeat(indent);

  if (isScalar(value)) {
    out.push(`${pad}${formatScalar(value)}`);
    return;
  }

  for (const [key, item] of entriesOf(value)) {
    const label = `${pad}${formatKey(key)}:`;
    if (isScalar(item)) {
      out.push(`${label} ${formatScalar(item)}`);
      continue;
    }
    const literal = emptyLiteral(item);
    if (literal) {
      out.push(`${label} ${literal}`);
    } else {
      out.push(label);
      emitNode(item, indent + 2, out);
    }
  }
}

/**
 * Emits block-style YAML readable by `parseYaml`. Pass a `Map` where key order
 * matters: plain objects list integer-like keys first.
 */
export function stringifyYaml(value: YamlNode): string {
  const literal = emptyLiteral(value);
  if (literal) {
    return `${literal}\n`;
  }
  const out: string[] = [];
  emitNode(value, 0, out);
  return `${out.join("\n")}\n`;
}
