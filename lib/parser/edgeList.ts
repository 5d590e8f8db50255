/**
 * Edge list text format.
 *
 * ```
 * # n m
 * 3 2
 * # tail head
 * 1 2
 * 2 3
 * ```
 *
 * Blank lines and everything after `#` are ignored. The first remaining
 * line gives the vertex and edge counts, and exactly m edge lines follow.
 * Endpoints are only checked for being positive integers here; range
 * checks against n belong to validation.
 *
 * @module
 */
import {
  createEdgeList,
  type EdgeList,
  type VertexId,
} from "../graph/edgeList.ts";
import {
  HASH,
  NEWLINE,
  PURELY_NUMERIC_REGEX,
  WHITESPACE_RUN_REGEX,
} from "./consts.ts";
import { EdgeListParseError } from "./parseError.ts";

export interface ParsedEdgeList {
  edges: EdgeList;
  n: number;
  m: number;
}

interface SourceLine {
  line: number;
  tokens: string[];
}

function meaningfulLines(text: string): SourceLine[] {
  const lines: SourceLine[] = [];
  text.split(NEWLINE).forEach((raw, idx) => {
    const hashAt = raw.indexOf(HASH);
    const content = (hashAt === -1 ? raw : raw.slice(0, hashAt)).trim();
    if (content.length > 0) {
      lines.push({
        line: idx + 1,
        tokens: content.split(WHITESPACE_RUN_REGEX),
      });
    }
  });
  return lines;
}

function parseInteger(token: string, line: number, what: string): number {
  if (!PURELY_NUMERIC_REGEX.test(token)) {
    throw new EdgeListParseError(
      line,
      `${what} must be an integer, got '${token}'`,
    );
  }
  const value = Number(token);
  if (!Number.isSafeInteger(value)) {
    throw new EdgeListParseError(line, `${what} is too large: ${token}`);
  }
  return value;
}

function expectPair(src: SourceLine, what: string): [string, string] {
  if (src.tokens.length !== 2) {
    throw new EdgeListParseError(
      src.line,
      `expected ${what}, found ${src.tokens.length} tokens`,
    );
  }
  return [src.tokens[0], src.tokens[1]];
}

export function parseEdgeList(text: string): ParsedEdgeList {
  const lines = meaningfulLines(text);
  const header = lines[0];
  if (header === undefined) {
    throw new EdgeListParseError(1, "missing 'n m' header");
  }

  const [nToken, mToken] = expectPair(header, "'n m' header");
  const n = parseInteger(nToken, header.line, "vertex count");
  const m = parseInteger(mToken, header.line, "edge count");

  const body = lines.slice(1);
  if (body.length < m) {
    const lastLine = lines[lines.length - 1].line;
    throw new EdgeListParseError(
      lastLine,
      `expected ${m} edges, found ${body.length}`,
    );
  }
  if (body.length > m) {
    throw new EdgeListParseError(
      body[m].line,
      `unexpected edge beyond the declared ${m}`,
    );
  }

  const pairs: Array<[VertexId, VertexId]> = body.map((src) => {
    const [tailToken, headToken] = expectPair(src, "'tail head'");
    const tail = parseInteger(tailToken, src.line, "tail");
    const head = parseInteger(headToken, src.line, "head");
    if (tail === 0 || head === 0) {
      throw new EdgeListParseError(src.line, "vertex ids start at 1");
    }
    return [tail, head];
  });

  return { edges: createEdgeList(pairs), n, m };
}
