/**
 * CLI output formatting
 *
 * Human-readable lines for interactive use, one JSON document per line
 * with --json.
 *
 * @module cli/lib/format
 */

import type { ChangeKind, ChangeNotification, SyncWarning } from '../../core/types.js';
import type { CycleReport } from '../../sync/sync-engine.js';

const KIND_WIDTH = 'ATTRIBUTE_CHANGED'.length;

export function formatChange(key: string, kind: ChangeKind): string {
  return `  ${kind.padEnd(KIND_WIDTH)} ${key}`;
}

export function formatWarning(warning: SyncWarning): string {
  switch (warning.type) {
    case 'record_skipped':
      return `record_skipped #${warning.index}: ${warning.reason}`;
    case 'color_defaulted':
      return `color_defaulted ${warning.key}: ${warning.value}`;
    case 'geometry_discarded':
      return `geometry_discarded ${warning.key}: ${warning.reason}`;
    case 'ambiguous_key_mapping':
      return (
        `ambiguous_key_mapping ${warning.primaryKey}: confirmed ${warning.confirmedSecondary}, ` +
        `conflicting ${warning.conflictingSecondary} (${warning.conflictingSource})`
      );
  }
}

export function formatReport(report: CycleReport): string {
  const changed = report.changes.filter((change) => change.kind !== 'UNCHANGED');
  const lines = [
    `Cycle ${report.cycle} ${report.status}: ${changed.length} changed, ` +
      `${report.warnings.length} warnings (${report.durationMs}ms)`,
  ];

  if (report.error !== undefined) {
    lines.push(`  error: ${report.error}`);
  }
  for (const change of changed) {
    lines.push(formatChange(change.key, change.kind));
  }
  for (const warning of report.warnings) {
    lines.push(`  warning: ${formatWarning(warning)}`);
  }
  return lines.join('\n');
}

export function reportToJson(report: CycleReport): string {
  return JSON.stringify({
    cycle: report.cycle,
    status: report.status,
    outcome: report.outcome,
    changes: report.changes
      .filter((change) => change.kind !== 'UNCHANGED')
      .map(({ key, kind }) => ({ key, kind })),
    unchanged: report.changes.filter((change) => change.kind === 'UNCHANGED').length,
    warnings: report.warnings,
    ...(report.error !== undefined ? { error: report.error } : {}),
    durationMs: report.durationMs,
  });
}

export function formatNotification(notification: ChangeNotification): string {
  return [
    `Cycle ${notification.cycle}: ${notification.keys.length} changed`,
    ...Array.from(notification.kinds, ([key, kind]) => formatChange(key, kind)),
  ].join('\n');
}

export function notificationToJson(notification: ChangeNotification): string {
  return JSON.stringify({
    cycle: notification.cycle,
    changes: Array.from(notification.kinds, ([key, kind]) => ({ key, kind })),
  });
}
