import type { ChartSeries } from "@behavior-intel/sdk"
import { chartConfig } from "../config/theme"
import { truncate } from "./format"
import { sanitizeCell } from "./sanitize"

function formatValue(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(2)
}

/**
 * Horizontal bar chart, one line per point, bars scaled to the largest
 * value. Pie and line series are drawn the same way.
 */
export function renderBarChart(series: ChartSeries, width: number = chartConfig.width): string[] {
  const lines = [series.title]
  if (series.points.length === 0) {
    lines.push("  (no data)")
    return lines
  }

  const max = Math.max(...series.points.map((p) => p.value))
  const labels = series.points.map((p) => truncate(sanitizeCell(p.label) || "(blank)", chartConfig.labelWidth))
  const labelWidth = Math.max(...labels.map((l) => l.length))

  series.points.forEach((point, i) => {
    const length = max > 0 ? Math.round((Math.max(point.value, 0) / max) * width) : 0
    lines.push(
      `  ${labels[i].padEnd(labelWidth)} ${chartConfig.bar.repeat(length)} ${formatValue(point.value)}`.trimEnd(),
    )
  })
  return lines
}
