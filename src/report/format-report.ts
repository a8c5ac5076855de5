import type {
  GroupReport,
  HistogramBin,
  LifetimeReport,
  LifetimeStats,
} from "./lifetime-report";

function hours(value: number | undefined): string {
  return value === undefined ? "-" : `${value.toFixed(1)}h`;
}

function statsLine(stats: LifetimeStats): string {
  return `count=${stats.count} with_lifetime=${stats.withLifetime} min=${hours(stats.minH)} median=${hours(stats.medianH)} max=${hours(stats.maxH)}`;
}

function histogramLines(bins: HistogramBin[], unit: string, indent: string): string[] {
  if (!bins.length) {
    return [`${indent}(empty)`];
  }
  const width = Math.max(...bins.map((bin) => String(bin.binStart).length));
  return bins.map(
    (bin) =>
      `${indent}${String(bin.binStart).padStart(width)}${unit} ${"#".repeat(bin.count)} ${bin.count}`,
  );
}

function groupLines(title: string, group: GroupReport): string[] {
  const lines = [`${title}: ${statsLine(group)}`];
  for (const interval of group.byInterval) {
    lines.push(`  every ${interval.intervalH}h: ${statsLine(interval)}`);
    if (interval.histogramH.length) {
      lines.push(...histogramLines(interval.histogramH, "h", "    "));
    }
  }
  return lines;
}

/**
 * Render a report as plain text for a terminal
 */
export function formatLifetimeReport(report: LifetimeReport): string {
  const lines = [
    `Probes: ${report.total}`,
    "",
    ...groupLines("Active", report.active),
    "",
    ...groupLines("Failed", report.failed),
    "",
    "Payload size, active (1000 byte bins):",
    ...histogramLines(report.payloadSizes.active, "B", "  "),
    "Payload size, failed (1000 byte bins):",
    ...histogramLines(report.payloadSizes.failed, "B", "  "),
  ];

  if (report.failureReasons.length) {
    lines.push("", "Failure reasons:");
    for (const { reason, count } of report.failureReasons) {
      lines.push(`  ${count} ${reason}`);
    }
  }

  return lines.join("\n");
}
