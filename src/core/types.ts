export type SummaryTag = 'FNF' | 'FNH' | 'LF' | 'LH' | 'BRF' | 'BRH';

export interface FunctionLine {
  kind: 'function';
  raw: string;
  start: number;
  end?: number;
  name: string;
}

export interface FunctionHitsLine {
  kind: 'function_hits';
  raw: string;
  count: number;
  name: string;
}

export interface LineHitsLine {
  kind: 'line_hits';
  raw: string;
  line: number;
  count: number;
}

export interface SummaryLine {
  kind: 'summary';
  raw: string;
  tag: SummaryTag;
  value: number;
}

export interface OtherLine {
  kind: 'other';
  raw: string;
}

export type BodyLine = FunctionLine | FunctionHitsLine | LineHitsLine | SummaryLine | OtherLine;

export interface SourceSection {
  path: string;
  /** Lines seen since the previous section (TN:, blanks), ending with the SF: line. */
  header: string[];
  body: BodyLine[];
  /** The end_of_record line as written. */
  footer: string;
}

export interface LcovReport {
  sections: SourceSection[];
  trailer: string[];
  trailingNewline: boolean;
}

export interface FunctionRange {
  name: string;
  start: number;
  end?: number;
  /** Last DA line number owned by this function; undefined when unbounded. */
  lastLine?: number;
}

export interface FunctionRecord extends FunctionRange {
  hits: number;
}

export interface DelegatePrefix {
  from: string;
  to: string;
}

export type LookupErrorPolicy = 'skip' | 'fail';

export interface PruneConfig {
  version: number;
  library_dir: string;
  test_globs: string[];
  ignore_globs: string[];
  tested_aliases: string[];
  delegate_prefixes: DelegatePrefix[];
  lookup_errors: LookupErrorPolicy;
  recount_summaries: boolean;
}

export interface TestIndex {
  names: ReadonlySet<string>;
  delegates: readonly DelegatePrefix[];
  /** Directories that could not be read during the scan (lookup_errors: skip). */
  unreadable: readonly string[];
}

export interface RemovedFunction {
  path: string;
  name: string;
  start: number;
}

export interface FilterResult {
  report: LcovReport;
  removed: RemovedFunction[];
  retained: number;
  /** Paths of sections carrying FNL/FNA function data, which is passed through unfiltered. */
  unfilteredFunctionData: string[];
}
