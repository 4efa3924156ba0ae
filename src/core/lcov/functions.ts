import { BodyLine, FunctionRecord, FunctionRange, SourceSection } from '../types';

/**
 * One range per FN line, repeated names included.
 *
 * A function without an explicit end owns every line up to the next greater
 * function start; the last one runs to the end of the file.
 */
export function functionRanges(section: SourceSection): FunctionRange[] {
  const ranges: FunctionRange[] = [];
  for (const line of section.body) {
    if (line.kind === 'function') ranges.push({ name: line.name, start: line.start, end: line.end });
  }

  const starts = [...new Set(ranges.map((range) => range.start))].sort((a, b) => a - b);
  for (const range of ranges) {
    if (range.end !== undefined) {
      range.lastLine = range.end;
      continue;
    }
    const next = starts.find((start) => start > range.start);
    range.lastLine = next === undefined ? undefined : next - 1;
  }

  return ranges;
}

/** Function records of a section in FN order; a name defined twice keeps its first definition. */
export function functionsInSection(section: SourceSection): FunctionRecord[] {
  const hits = new Map<string, number>();
  for (const line of section.body) {
    if (line.kind === 'function_hits' && !hits.has(line.name)) {
      hits.set(line.name, line.count);
    }
  }

  const records: FunctionRecord[] = [];
  const seen = new Set<string>();
  for (const range of functionRanges(section)) {
    if (seen.has(range.name)) continue;
    seen.add(range.name);
    records.push({ ...range, hits: hits.get(range.name) ?? 0 });
  }
  return records;
}

function covers(range: FunctionRange, lineNo: number): boolean {
  if (lineNo < range.start) return false;
  return range.lastLine === undefined || lineNo <= range.lastLine;
}

/**
 * Names of the functions a body line belongs to, in FN order without repeats.
 *
 * Empty for lines no function owns (summaries, branch data, DA lines before
 * the first function). A DA line falls to every function whose range holds it:
 * nested functions, and symbols sharing a start line such as C++ constructor
 * variants.
 */
export function ownersOf(line: BodyLine, ranges: readonly FunctionRange[]): string[] {
  switch (line.kind) {
    case 'function':
    case 'function_hits':
      return [line.name];
    case 'line_hits': {
      const owners: string[] = [];
      for (const range of ranges) {
        if (covers(range, line.line) && !owners.includes(range.name)) owners.push(range.name);
      }
      return owners;
    }
    default:
      return [];
  }
}
