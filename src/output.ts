/**
 * Console output and argument parsing shared by the CLI commands
 */

import { InvalidArgumentError } from 'commander';
import { ProjectSummary, ProjectSyncReport } from './types';

export function parseSince(value: string): Date {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new InvalidArgumentError(`"${value}" is not an ISO 8601 timestamp`);
  }
  return date;
}

/** Exit status for a finished run: 0 clean, 2 when records failed or a project aborted */
export function exitCodeFor(reports: ProjectSyncReport[]): number {
  return reports.some(report => report.failed > 0 || report.aborted !== undefined) ? 2 : 0;
}

export function formatProjectTable(title: string, rows: ProjectSummary[]): string {
  if (rows.length === 0) return `${title}: no projects`;
  const idWidth = Math.max(2, ...rows.map(row => row.id.length));
  const nameWidth = Math.max(4, ...rows.map(row => row.name.length));
  const header = [
    `${title}:`,
    `  ${'ID'.padEnd(idWidth)}  |  ${'Name'.padEnd(nameWidth)}`,
    `  ${'-'.repeat(idWidth)}--+-${'-'.repeat(nameWidth)}`,
  ];
  return [...header, ...rows.map(row => `  ${row.id.padEnd(idWidth)}  |  ${row.name}`)].join('\n');
}

/** Report JSON with the visit list collapsed to its length */
export function summarizeReports(reports: ProjectSyncReport[]): Array<Omit<ProjectSyncReport, 'visits'> & { visits: number }> {
  return reports.map(({ visits, ...summary }) => ({ ...summary, visits: visits.length }));
}

export function printReports(reports: ProjectSyncReport[]): void {
  console.log(JSON.stringify(summarizeReports(reports), null, 2));
}
