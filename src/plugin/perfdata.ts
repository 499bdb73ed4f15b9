/**
 * Performance data formatting
 * Produces `label=value[unit];warn;crit;min;max` entries for graphing by the supervisor
 */

export interface PerfDataEntry {
  readonly label: string;
  readonly value: number;
  readonly unit?: string;
  readonly warning?: string;
  readonly critical?: string;
  readonly min?: number;
  readonly max?: number;
}

function quoteLabel(label: string): string {
  if (/[\s='"]/.test(label)) {
    return `'${label.replace(/'/g, "''")}'`;
  }
  return label;
}

function field(value: string | number | undefined): string {
  return value === undefined ? "" : String(value);
}

export function formatPerfData(entry: PerfDataEntry): string {
  const out = [
    `${quoteLabel(entry.label)}=${entry.value}${entry.unit ?? ""}`,
    field(entry.warning),
    field(entry.critical),
    field(entry.min),
    field(entry.max),
  ].join(";");
  // Unset min and max leave a trailing ";;" that is dropped once
  return out.endsWith(";;") ? out.slice(0, -2) : out;
}
