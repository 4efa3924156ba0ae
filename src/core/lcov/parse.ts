import { ParseError } from '../errors';
import { BodyLine, LcovReport, SourceSection, SummaryTag } from '../types';

export type ParserState = 'outside' | 'in_section' | 'in_function';

/** What the parser does with a line, given the state it is in. */
export type ParserAction = 'header' | 'open' | 'body' | 'close' | 'error';

export type LineClass = 'source' | 'function' | 'end' | 'record' | 'loose';

const RECORD_TAGS: ReadonlySet<string> = new Set([
  'FN',
  'FNDA',
  'FNF',
  'FNH',
  'FNL',
  'FNA',
  'DA',
  'LF',
  'LH',
  'BRDA',
  'BRF',
  'BRH',
]);

const SUMMARY_TAGS: readonly SummaryTag[] = ['FNF', 'FNH', 'LF', 'LH', 'BRF', 'BRH'];

function isSummaryTag(tag: string): tag is SummaryTag {
  return SUMMARY_TAGS.some((summary) => summary === tag);
}

interface Transition {
  action: ParserAction;
  next: ParserState;
  reason?: string;
}

export const TRANSITIONS: Record<ParserState, Record<LineClass, Transition>> = {
  outside: {
    source: { action: 'open', next: 'in_section' },
    function: { action: 'error', next: 'outside', reason: 'function record outside of a source section' },
    end: { action: 'error', next: 'outside', reason: 'end_of_record without a preceding SF' },
    record: { action: 'error', next: 'outside', reason: 'coverage record outside of a source section' },
    loose: { action: 'header', next: 'outside' },
  },
  in_section: {
    source: { action: 'error', next: 'in_section', reason: 'SF inside an unterminated source section' },
    function: { action: 'body', next: 'in_function' },
    end: { action: 'close', next: 'outside' },
    record: { action: 'body', next: 'in_section' },
    loose: { action: 'body', next: 'in_section' },
  },
  in_function: {
    source: { action: 'error', next: 'in_function', reason: 'SF inside an unterminated source section' },
    function: { action: 'body', next: 'in_function' },
    end: { action: 'close', next: 'outside' },
    record: { action: 'body', next: 'in_function' },
    loose: { action: 'body', next: 'in_function' },
  },
};

function tagOf(text: string): string {
  const colon = text.indexOf(':');
  return colon === -1 ? text : text.slice(0, colon);
}

export function classifyLine(text: string): LineClass {
  if (text === 'end_of_record') return 'end';
  const tag = tagOf(text);
  if (tag === 'SF') return 'source';
  if (tag === 'FN') return 'function';
  if (RECORD_TAGS.has(tag) && text.length > tag.length) return 'record';
  return 'loose';
}

function toCount(value: string | undefined): number | null {
  if (value === undefined || !/^\d+$/.test(value)) return null;
  return Number(value);
}

// Execution counts are not always integers: some generators write averaged hits.
function toHits(value: string | undefined): number | null {
  if (value === undefined || !/^-?\d+(?:\.\d+)?$/.test(value)) return null;
  return Number(value);
}

function parseBodyLine(raw: string, text: string, lineNo: number): BodyLine {
  const tag = tagOf(text);
  const value = text.slice(tag.length + 1);

  if (tag === 'FN') {
    const match = /^(\d+)(?:,(\d+))?,(.+)$/.exec(value);
    if (!match) throw new ParseError(lineNo, 'malformed FN record', raw);
    return {
      kind: 'function',
      raw,
      start: Number(match[1]),
      end: match[2] === undefined ? undefined : Number(match[2]),
      name: match[3],
    };
  }

  if (tag === 'FNDA') {
    const comma = value.indexOf(',');
    const count = comma === -1 ? null : toHits(value.slice(0, comma));
    const name = comma === -1 ? '' : value.slice(comma + 1);
    if (count === null || !name) throw new ParseError(lineNo, 'malformed FNDA record', raw);
    return { kind: 'function_hits', raw, count, name };
  }

  if (tag === 'DA') {
    const [lineField, countField] = value.split(',');
    const line = toCount(lineField);
    const count = toHits(countField);
    if (line === null || count === null) throw new ParseError(lineNo, 'malformed DA record', raw);
    return { kind: 'line_hits', raw, line, count };
  }

  if (isSummaryTag(tag)) {
    const count = toCount(value);
    if (count === null) throw new ParseError(lineNo, `malformed ${tag} record`, raw);
    return { kind: 'summary', raw, tag, value: count };
  }

  return { kind: 'other', raw };
}

/**
 * Split LCOV text into source sections.
 *
 * Raw line text is kept on every entry so rendering the result gives back the
 * input byte for byte.
 */
export function parseLcov(content: string): LcovReport {
  if (content === '') {
    return { sections: [], trailer: [], trailingNewline: false };
  }

  const lines = content.split('\n');
  const trailingNewline = lines[lines.length - 1] === '';
  if (trailingNewline) lines.pop();

  const sections: SourceSection[] = [];
  let pending: string[] = [];
  let current: SourceSection | null = null;
  let openedAt = 0;
  let state: ParserState = 'outside';

  for (let i = 0; i < lines.length; i += 1) {
    const raw = lines[i];
    const text = raw.trim();
    const lineNo = i + 1;
    const transition: Transition = TRANSITIONS[state][classifyLine(text)];

    switch (transition.action) {
      case 'error':
        throw new ParseError(lineNo, transition.reason ?? 'unexpected line', raw);
      case 'header':
        pending.push(raw);
        break;
      case 'open':
        if (text.length <= 3) throw new ParseError(lineNo, 'SF record without a path', raw);
        current = { path: text.slice(3), header: [...pending, raw], body: [], footer: '' };
        pending = [];
        openedAt = lineNo;
        break;
      case 'body':
        if (current) current.body.push(parseBodyLine(raw, text, lineNo));
        break;
      case 'close':
        if (current) {
          current.footer = raw;
          sections.push(current);
        }
        current = null;
        break;
    }
    state = transition.next;
  }

  if (current) {
    throw new ParseError(openedAt, 'source section is missing end_of_record', current.header[current.header.length - 1]);
  }

  return { sections, trailer: pending, trailingNewline };
}
