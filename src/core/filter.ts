import { isStaticPath } from './classify';
import { functionRanges, functionsInSection, ownersOf } from './lcov/functions';
import { logger } from './logger';
import { testExists } from './test-index';
import { BodyLine, FilterResult, LcovReport, RemovedFunction, SourceSection, TestIndex } from './types';

export interface FilterOptions {
  index: TestIndex;
  libraryDir: string;
  cwd: string;
  recountSummaries?: boolean;
}

function recount(body: BodyLine[]): BodyLine[] {
  let fnf = 0;
  let fnh = 0;
  let lf = 0;
  let lh = 0;
  for (const line of body) {
    if (line.kind === 'function') fnf += 1;
    if (line.kind === 'function_hits' && line.count > 0) fnh += 1;
    if (line.kind === 'line_hits') {
      lf += 1;
      if (line.count > 0) lh += 1;
    }
  }
  const totals = { FNF: fnf, FNH: fnh, LF: lf, LH: lh };

  return body.map((line): BodyLine => {
    if (line.kind !== 'summary') return line;
    if (line.tag === 'BRF' || line.tag === 'BRH') return line;
    const value = totals[line.tag];
    const eol = line.raw.endsWith('\r') ? '\r' : '';
    return { ...line, value, raw: `${line.tag}:${value}${eol}` };
  });
}

// lcov 2.2 function data; function names sit behind FNL indices, so it is not attributed.
function hasIndexedFunctionData(section: SourceSection): boolean {
  return section.body.some(
    (line) => line.kind === 'other' && (line.raw.trim().startsWith('FNL:') || line.raw.trim().startsWith('FNA:')),
  );
}

function filterSection(
  section: SourceSection,
  options: FilterOptions,
): { section: SourceSection; removed: RemovedFunction[]; retained: number } {
  const records = functionsInSection(section);
  const isStatic = isStaticPath(section.path, options.libraryDir, options.cwd);
  const dropped = new Set<string>();
  const removed: RemovedFunction[] = [];

  for (const record of records) {
    if (isStatic || testExists(options.index, record.name)) continue;
    dropped.add(record.name);
    removed.push({ path: section.path, name: record.name, start: record.start });
  }

  if (!dropped.size) {
    return { section, removed, retained: records.length };
  }

  const ranges = functionRanges(section);
  let body = section.body.filter((line) => {
    const owners = ownersOf(line, ranges);
    return owners.length === 0 || owners.some((owner) => !dropped.has(owner));
  });
  if (options.recountSummaries) {
    body = recount(body);
  }

  return { section: { ...section, body }, removed, retained: records.length - dropped.size };
}

/**
 * Drop the coverage of every non-library function without a unit test.
 *
 * Nothing is added, renamed or reordered. Summary lines are left as they are
 * unless `recountSummaries` is set.
 */
export function filterReport(report: LcovReport, options: FilterOptions): FilterResult {
  const removed: RemovedFunction[] = [];
  const unfilteredFunctionData: string[] = [];
  let retained = 0;

  const sections = report.sections.map((section) => {
    if (hasIndexedFunctionData(section)) {
      logger.warn('filter', 'FNL/FNA function data is passed through unfiltered', { path: section.path });
      unfilteredFunctionData.push(section.path);
    }
    const result = filterSection(section, options);
    removed.push(...result.removed);
    retained += result.retained;
    return result.section;
  });

  logger.debug('filter', 'filtered report', { sections: sections.length, retained, removed: removed.length });
  return { report: { ...report, sections }, removed, retained, unfilteredFunctionData };
}
