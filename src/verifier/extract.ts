import type { VertexId } from "../../graph-kit/src/index.js";
import { ParseFailure } from "../errors.js";
import type { AnswerKind, AnswerOf, CanonicalAnswer } from "../families/types.js";

export interface ExtractOptions {
  /** Label prefix used by the representation; stripped before parsing. */
  readonly vertexPrefix?: string;
  /** Number of vertices; colourings are padded to it with `-1`. */
  readonly vertexCount?: number;
}

/**
 * Portion of the response the answer is read from. When a final-answer
 * marker is present the first match inside it wins, otherwise the last match
 * anywhere in the text.
 */
export interface AnswerRegion {
  readonly text: string;
  readonly marked: boolean;
}

const NUMBER = /-?\d+(?:\.\d+)?/g;
const BOOLEAN = /\b(yes|no|true|false)\b/gi;
const VERTEX_LIST = /\d+(?:\s*(?:->|→|,|;)\s*\d+)+/g;
const BRACKETED = /[[{(]([^\]})]*)[\]})]/g;
/** `[...]` or `{...}` holding nothing but integers. */
const SET_GROUP = /[[{]\s*((?:-?\d+(?:\s*[,;]\s*-?\d+)*)?)\s*[\]}]/g;
const COST = /\b(?:weight|cost|length|distance|total)\b[^\d-]{0,24}(-?\d+(?:\.\d+)?)/gi;
const COLOR_PAIR = /(?:\bvertex\s*)?(\d+)\s*(?::|->|→|=)\s*(?:colou?r\s*)?(\d+)/gi;
const EMPTY_SET = /(?:\[\s*\]|\{\s*\}|\bnone\b|\bempty\b|\bno (?:such )?vertices\b)/i;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Rewrites `v3` as `3` so every shape parser sees bare integers. */
export function stripVertexPrefix(text: string, prefix = ""): string {
  if (prefix.length === 0) {
    return text;
  }
  return text.replace(new RegExp(`\\b${escapeRegExp(prefix)}(\\d+)\\b`, "g"), "$1");
}

export function answerRegion(text: string): AnswerRegion {
  const boxed = [...text.matchAll(/\\boxed\{([^{}]*(?:\{[^{}]*\}[^{}]*)*)\}/g)].at(-1);
  if (boxed) {
    return { text: boxed[1], marked: true };
  }
  const markers = [...text.matchAll(/\bfinal answer\b\s*(?:is\b)?\s*[:=]?|\banswer\s*(?:is\b\s*[:=]?|[:=])/gi)];
  const last = markers.at(-1);
  if (last?.index !== undefined) {
    const rest = text.slice(last.index + last[0].length).trim();
    if (rest.length > 0) {
      return { text: rest, marked: true };
    }
  }
  return { text, marked: false };
}

function matches(pattern: RegExp, text: string): RegExpMatchArray[] {
  return [...text.matchAll(pattern)];
}

/** First match inside a marked region, last match otherwise. */
function choose<T>(items: readonly T[], region: AnswerRegion): T | undefined {
  return region.marked ? items[0] : items.at(-1);
}

function integers(text: string): VertexId[] {
  return (text.match(/\d+/g) ?? []).map(Number);
}

function extractBoolean(region: AnswerRegion): AnswerOf<"boolean"> {
  const match = choose(matches(BOOLEAN, region.text), region);
  if (!match) {
    throw new ParseFailure("no yes/no answer found");
  }
  const word = match[1].toLowerCase();
  return { kind: "boolean", value: word === "yes" || word === "true" };
}

function extractScalar(region: AnswerRegion): AnswerOf<"scalar"> {
  const match = choose(matches(NUMBER, region.text), region);
  if (!match) {
    throw new ParseFailure("no number found");
  }
  return { kind: "scalar", value: Number(match[0]) };
}

function extractVertexList(region: AnswerRegion): VertexId[] {
  const list = choose(matches(VERTEX_LIST, region.text), region);
  if (list) {
    return integers(list[0]);
  }
  if (region.marked) {
    const loose = integers(region.text);
    if (loose.length > 0) {
      return loose;
    }
  }
  throw new ParseFailure("no vertex sequence found");
}

function extractSequence(region: AnswerRegion): AnswerOf<"sequence"> {
  return { kind: "sequence", vertices: extractVertexList(region) };
}

function extractPath(region: AnswerRegion, whole: string): AnswerOf<"path"> {
  const vertices = extractVertexList(region);
  const costs = matches(COST, region.text);
  const cost = costs.at(-1) ?? matches(COST, whole).at(-1);
  return { kind: "path", vertices, cost: cost ? Number(cost[1]) : null };
}

function extractVertexSet(region: AnswerRegion): AnswerOf<"vertex-set"> {
  const grouped =
    choose(matches(SET_GROUP, region.text), region) ??
    choose(
      matches(BRACKETED, region.text).filter((group) => /\d/.test(group[1])),
      region,
    );
  if (grouped) {
    return { kind: "vertex-set", vertices: [...new Set(integers(grouped[1]))].sort((left, right) => left - right) };
  }
  if (EMPTY_SET.test(region.text)) {
    return { kind: "vertex-set", vertices: [] };
  }
  const vertices = extractVertexList(region);
  return { kind: "vertex-set", vertices: [...new Set(vertices)].sort((left, right) => left - right) };
}

function extractColoring(region: AnswerRegion, whole: string, vertexCount: number | undefined): AnswerOf<"coloring"> {
  let pairs = matches(COLOR_PAIR, region.text);
  if (pairs.length === 0 && region.marked) {
    pairs = matches(COLOR_PAIR, whole);
  }
  let assigned = new Map<VertexId, number>();
  for (const pair of pairs) {
    assigned.set(Number(pair[1]), Number(pair[2]));
  }
  if (assigned.size === 0) {
    const list = choose(matches(BRACKETED, region.text), region);
    if (!list) {
      throw new ParseFailure("no vertex colour assignment found");
    }
    assigned = new Map(integers(list[1]).map((color, vertex) => [vertex, color] as const));
  }
  const length = Math.max(vertexCount ?? 0, ...[...assigned.keys()].map((vertex) => vertex + 1));
  return { kind: "coloring", colors: Array.from({ length }, (_, vertex) => assigned.get(vertex) ?? -1) };
}

/**
 * Reads an answer of shape `kind` from free text. Throws {@link ParseFailure}
 * when nothing of that shape is present.
 */
export function extractAnswer(kind: AnswerKind, rawText: string, options: ExtractOptions = {}): CanonicalAnswer {
  const text = stripVertexPrefix(rawText, options.vertexPrefix);
  if (text.trim().length === 0) {
    throw new ParseFailure("empty response");
  }
  const region = answerRegion(text);
  switch (kind) {
    case "boolean":
      return extractBoolean(region);
    case "scalar":
      return extractScalar(region);
    case "sequence":
      return extractSequence(region);
    case "path":
      return extractPath(region, text);
    case "vertex-set":
      return extractVertexSet(region);
    case "coloring":
      return extractColoring(region, text, options.vertexCount);
  }
}
