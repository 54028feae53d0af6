/**
 * Prometheus text exposition parser (format version 0.0.4).
 *
 * Turns a scraped body into typed metrics:
 *  - counter, gauge and untyped samples become one metric each, with a single
 *    `counter`, `gauge` or `value` field
 *  - summary and histogram samples sharing a label set (ignoring `quantile`
 *    and `le`) fold into one metric with `count`, `sum` and one field per
 *    quantile or bucket bound
 *
 * The delimited protobuf encoding is not decoded; a protobuf response is a
 * parse error.
 */

import type { Headers } from "undici";
import { METRIC_KINDS, type MetricKind, type ParsedMetric } from "@scrapeline/shared";
import { ParseError } from "../errors.js";

/** Turns a scraped body into typed metrics; throws on malformed input */
export interface ExpositionParser {
  parse(body: Uint8Array, headers: Headers): ParsedMetric[];
}

// ---------------------------------------------------------------------------
// Lexing
// ---------------------------------------------------------------------------

const METRIC_NAME_RE = /[a-zA-Z_:][a-zA-Z0-9_:]*/y;
const LABEL_NAME_RE = /[a-zA-Z_][a-zA-Z0-9_]*/y;
const TYPE_LINE_RE = /^#\s*TYPE\s+([a-zA-Z_:][a-zA-Z0-9_:]*)\s+(\S+)\s*$/;

const PROTOBUF_CONTENT_TYPE = "application/vnd.google.protobuf";

const KNOWN_KINDS = new Set<string>(METRIC_KINDS);

interface Sample {
  name: string;
  labels: Record<string, string>;
  value: number;
  timestamp?: Date;
}

function isKind(kind: string): kind is MetricKind {
  return KNOWN_KINDS.has(kind);
}

function skipSpaces(line: string, pos: number): number {
  while (line[pos] === " " || line[pos] === "\t") pos++;
  return pos;
}

function matchAt(re: RegExp, line: string, pos: number): string | undefined {
  re.lastIndex = pos;
  return re.exec(line)?.[0];
}

/** Parse `name="value",...}` starting after the opening brace; returns the index after `}` */
function parseLabels(
  line: string,
  start: number,
  labels: Record<string, string>,
  lineNo: number,
): number {
  let pos = skipSpaces(line, start);
  if (line[pos] === "}") return pos + 1;

  while (pos < line.length) {
    const name = matchAt(LABEL_NAME_RE, line, pos);
    if (!name) throw new ParseError("invalid label name", lineNo);
    pos = skipSpaces(line, pos + name.length);
    if (line[pos] !== "=") throw new ParseError(`expected "=" after label ${name}`, lineNo);
    pos = skipSpaces(line, pos + 1);
    if (line[pos] !== '"') throw new ParseError(`expected quoted value for label ${name}`, lineNo);
    pos++;

    let value = "";
    let closed = false;
    while (pos < line.length) {
      const ch = line[pos];
      if (ch === "\\") {
        const next = line[pos + 1];
        if (next === "n") value += "\n";
        else if (next === "\\" || next === '"') value += next;
        else throw new ParseError(`invalid escape in label ${name}`, lineNo);
        pos += 2;
        continue;
      }
      pos++;
      if (ch === '"') {
        closed = true;
        break;
      }
      value += ch;
    }
    if (!closed) throw new ParseError(`unterminated value for label ${name}`, lineNo);
    labels[name] = value;

    pos = skipSpaces(line, pos);
    if (line[pos] === ",") {
      pos = skipSpaces(line, pos + 1);
      if (line[pos] === "}") return pos + 1;
      continue;
    }
    if (line[pos] === "}") return pos + 1;
    throw new ParseError(`expected "," or "}" after label ${name}`, lineNo);
  }

  throw new ParseError("unterminated label set", lineNo);
}

function parseValue(token: string, lineNo: number): number {
  switch (token) {
    case "NaN":
      return NaN;
    case "+Inf":
    case "Inf":
      return Infinity;
    case "-Inf":
      return -Infinity;
  }
  const value = Number(token);
  if (Number.isNaN(value)) throw new ParseError(`invalid sample value ${token}`, lineNo);
  return value;
}

function parseSample(line: string, lineNo: number): Sample {
  const name = matchAt(METRIC_NAME_RE, line, 0);
  if (!name) throw new ParseError("invalid metric name", lineNo);

  const labels: Record<string, string> = {};
  let pos = skipSpaces(line, name.length);
  if (line[pos] === "{") {
    pos = parseLabels(line, pos + 1, labels, lineNo);
  }

  const tokens = line.slice(pos).trim().split(/\s+/).filter(Boolean);
  if (tokens.length === 0) throw new ParseError(`missing value for ${name}`, lineNo);
  if (tokens.length > 2) throw new ParseError(`unexpected text after sample ${name}`, lineNo);

  const sample: Sample = { name, labels, value: parseValue(tokens[0], lineNo) };
  if (tokens.length === 2) {
    const ms = Number(tokens[1]);
    if (!Number.isInteger(ms)) throw new ParseError(`invalid timestamp ${tokens[1]}`, lineNo);
    sample.timestamp = new Date(ms);
  }
  return sample;
}

/** Shortest decimal form of a quantile or bucket bound, used as a field key */
function boundKey(raw: string, lineNo: number): string {
  const bound = parseValue(raw, lineNo);
  if (bound === Infinity) return "+Inf";
  if (bound === -Infinity) return "-Inf";
  return String(bound);
}

/** Group key for summary/histogram samples: family plus labels, minus `skip` */
function groupKey(family: string, labels: Record<string, string>, skip: string): string {
  const pairs = Object.entries(labels)
    .filter(([k]) => k !== skip)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([k, v]) => `${k}=${JSON.stringify(v)}`);
  return `${family}{${pairs.join(",")}}`;
}

function withoutLabel(labels: Record<string, string>, skip: string): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [k, v] of Object.entries(labels)) {
    if (k !== skip) result[k] = v;
  }
  return result;
}

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

const SCALAR_FIELDS: Record<"counter" | "gauge" | "untyped", string> = {
  counter: "counter",
  gauge: "gauge",
  untyped: "value",
};

export class TextParser implements ExpositionParser {
  private now: () => Date;

  constructor(options?: { now?: () => Date }) {
    this.now = options?.now ?? (() => new Date());
  }

  parse(body: Uint8Array, headers: Headers): ParsedMetric[] {
    const contentType = headers.get("content-type") ?? "";
    if (contentType.includes(PROTOBUF_CONTENT_TYPE)) {
      throw new ParseError(`unsupported exposition encoding ${PROTOBUF_CONTENT_TYPE}`);
    }
    return this.parseText(new TextDecoder().decode(body));
  }

  parseText(text: string): ParsedMetric[] {
    const parsedAt = this.now();
    const kinds = new Map<string, MetricKind>();
    const metrics: ParsedMetric[] = [];
    const groups = new Map<string, ParsedMetric>();

    const lines = text.split("\n");
    for (let i = 0; i < lines.length; i++) {
      const lineNo = i + 1;
      const line = lines[i].trim();
      if (!line) continue;

      if (line.startsWith("#")) {
        const typeMatch = TYPE_LINE_RE.exec(line);
        if (typeMatch) {
          const [, family, kind] = typeMatch;
          kinds.set(family, isKind(kind) ? kind : "untyped");
        }
        continue;
      }

      const sample = parseSample(line, lineNo);
      const timestamp = sample.timestamp ?? parsedAt;
      const { family, kind, suffix } = this.familyOf(sample.name, kinds);

      if (kind === "counter" || kind === "gauge" || kind === "untyped") {
        metrics.push({
          name: sample.name,
          kind,
          fields: { [SCALAR_FIELDS[kind]]: sample.value },
          tags: sample.labels,
          timestamp,
        });
        continue;
      }

      // summary / histogram: fold into one metric per label set
      const boundLabel = kind === "summary" ? "quantile" : "le";
      const key = groupKey(family, sample.labels, boundLabel);
      let metric = groups.get(key);
      if (!metric) {
        metric = {
          name: family,
          kind,
          fields: {},
          tags: withoutLabel(sample.labels, boundLabel),
          timestamp,
        };
        groups.set(key, metric);
        metrics.push(metric);
      }

      if (suffix === "_sum") {
        metric.fields.sum = sample.value;
      } else if (suffix === "_count") {
        metric.fields.count = sample.value;
      } else {
        const bound = sample.labels[boundLabel];
        if (bound === undefined) {
          throw new ParseError(`${kind} sample ${sample.name} has no ${boundLabel} label`, lineNo);
        }
        metric.fields[boundKey(bound, lineNo)] = sample.value;
      }
    }

    return metrics;
  }

  /** Resolve the family a sample belongs to from the declared TYPE lines */
  private familyOf(
    name: string,
    kinds: Map<string, MetricKind>,
  ): { family: string; kind: MetricKind; suffix?: string } {
    for (const suffix of ["_bucket", "_sum", "_count"]) {
      if (!name.endsWith(suffix)) continue;
      const family = name.slice(0, -suffix.length);
      const kind = kinds.get(family);
      if (kind === "histogram" || (kind === "summary" && suffix !== "_bucket")) {
        return { family, kind, suffix };
      }
    }
    return { family: name, kind: kinds.get(name) ?? "untyped" };
  }
}
