import { LcovReport } from '../types';

export function renderLcov(report: LcovReport): string {
  const lines: string[] = [];
  for (const section of report.sections) {
    lines.push(...section.header);
    for (const line of section.body) {
      lines.push(line.raw);
    }
    lines.push(section.footer);
  }
  lines.push(...report.trailer);

  if (!lines.length) return '';
  return lines.join('\n') + (report.trailingNewline ? '\n' : '');
}
