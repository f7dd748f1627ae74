// ============================================================
// acf-locate — ACF/VDF Tree Parser
// ============================================================
// Recursive descent over the fragment list produced by tokenize().
// Each nested `{ ... }` group is parsed as a sub-range of the same
// fragment array, so error positions are absolute document indices.
//
// Grammar (as used by Steam's metadata files):
//   block := (key value)*
//   key   := "quoted"
//   value := "quoted" | "quoted with spaces" | '{' block '}'

import {
  tokenize,
  countQuotes,
  isFullyQuoted,
  stripQuotes,
  stripLeadingQuote,
  stripTrailingQuote,
} from './tokenizer.js';
import type { AcfBlock, AcfNode, MalformedDocument, Result } from '../types/index.js';

export const DEFAULT_MAX_DEPTH = 64;
export const DEFAULT_MAX_FRAGMENTS = 1_000_000;

const END_OF_DOCUMENT = 'end of document';
const END_OF_BLOCK = 'end of block';

export interface ParseOptions {
  /** File the text came from; copied into errors */
  source?: string;
  /** Deepest allowed `{` nesting */
  maxDepth?: number;
  /** Largest allowed fragment count */
  maxFragments?: number;
}

interface ParseState {
  fragments: readonly string[];
  maxDepth: number;
  source?: string;
}

type ParseResult<T> = Result<T, MalformedDocument>;

/**
 * Parse a whole ACF/VDF document.
 */
export function parseAcf(text: string, options: ParseOptions = {}): ParseResult<AcfBlock> {
  return parseFragments(tokenize(text), options);
}

/**
 * Parse an already tokenized document into its root block.
 */
export function parseFragments(
  fragments: readonly string[],
  options: ParseOptions = {},
): ParseResult<AcfBlock> {
  const maxFragments = options.maxFragments ?? DEFAULT_MAX_FRAGMENTS;
  const state: ParseState = {
    fragments,
    maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH,
    source: options.source,
  };

  if (fragments.length > maxFragments) {
    return fail(state, maxFragments, `at most ${maxFragments} fragments`, `${fragments.length} fragments`);
  }

  return parseRange(state, 0, fragments.length, 0);
}

/**
 * Parse fragments[start, end) as the body of one block.
 */
function parseRange(
  state: ParseState,
  start: number,
  end: number,
  depth: number,
): ParseResult<AcfBlock> {
  const { fragments } = state;
  const entries = new Map<string, AcfNode>();

  let position = start;
  while (position < end) {
    // ── key ──
    const keyFragment = fragments[position];
    if (!isFullyQuoted(keyFragment)) {
      return fail(state, position, 'key', keyFragment);
    }
    const key = stripQuotes(keyFragment);
    position++;

    // ── value ──
    if (position >= end) {
      return fail(state, position, 'value or list', endOf(state, end));
    }

    const valueFragment = fragments[position];
    const quotes = countQuotes(valueFragment);

    if (quotes === 1) {
      // Value with embedded whitespace, split across fragments
      const joined = joinQuotedValue(state, position, end);
      if (!joined.ok) return joined;
      entries.set(key, leaf(joined.data.value));
      position = joined.data.next;
    } else if (quotes >= 2) {
      entries.set(key, leaf(stripQuotes(valueFragment)));
      position++;
    } else if (valueFragment === '{') {
      const nested = parseNestedBlock(state, position, end, depth);
      if (!nested.ok) return nested;
      entries.set(key, nested.data.block);
      position = nested.data.next;
    } else {
      return fail(state, position, 'value or list', valueFragment);
    }
  }

  return { ok: true, data: { kind: 'block', entries } };
}

/**
 * Join `"hello`, `big`, `world"` into `hello big world`.
 * `position` points at the opening piece.
 */
function joinQuotedValue(
  state: ParseState,
  position: number,
  end: number,
): ParseResult<{ value: string; next: number }> {
  const { fragments } = state;
  const pieces = [stripLeadingQuote(fragments[position])];

  let cursor = position + 1;
  while (cursor < end && !fragments[cursor].includes('"')) {
    pieces.push(fragments[cursor]);
    cursor++;
  }

  if (cursor >= end) {
    return fail(state, cursor, 'closing quote', endOf(state, end));
  }

  pieces.push(stripTrailingQuote(fragments[cursor]));
  return { ok: true, data: { value: pieces.join(' '), next: cursor + 1 } };
}

/**
 * Find the brace matching the `{` at `position` and parse what lies between.
 * Braces inside an open multi-fragment quoted value do not count.
 */
function parseNestedBlock(
  state: ParseState,
  position: number,
  end: number,
  depth: number,
): ParseResult<{ block: AcfBlock; next: number }> {
  const { fragments } = state;

  if (depth + 1 > state.maxDepth) {
    return fail(state, position, `nesting depth <= ${state.maxDepth}`, `depth ${depth + 1}`);
  }

  const bodyStart = position + 1;
  let level = 1;
  let inQuote = false;
  let cursor = bodyStart;

  while (cursor < end) {
    const fragment = fragments[cursor];
    if (countQuotes(fragment) % 2 === 1) {
      inQuote = !inQuote;
    } else if (!inQuote && fragment === '{') {
      level++;
    } else if (!inQuote && fragment === '}') {
      level--;
      if (level === 0) break;
    }
    cursor++;
  }

  if (level !== 0) {
    return fail(state, cursor, 'closing brace', endOf(state, end));
  }

  // cursor sits on the matching '}'
  if (cursor === bodyStart) {
    return { ok: true, data: { block: emptyBlock(), next: cursor + 1 } };
  }

  const inner = parseRange(state, bodyStart, cursor, depth + 1);
  if (!inner.ok) return inner;

  return { ok: true, data: { block: inner.data, next: cursor + 1 } };
}

function leaf(value: string): AcfNode {
  return { kind: 'leaf', value };
}

function emptyBlock(): AcfBlock {
  return { kind: 'block', entries: new Map() };
}

/** What lies at `end`: the enclosing `}` or nothing */
function endOf(state: ParseState, end: number): string {
  return end < state.fragments.length ? END_OF_BLOCK : END_OF_DOCUMENT;
}

function fail(
  state: ParseState,
  position: number,
  expected: string,
  found: string,
): { ok: false; error: MalformedDocument } {
  const error: MalformedDocument = { kind: 'malformed-document', position, expected, found };
  if (state.source !== undefined) error.source = state.source;
  return { ok: false, error };
}
