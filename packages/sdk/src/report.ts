import PDFDocument from "pdfkit"
import { dayCount, formatCompactDate, formatLongDate } from "./date-range"
import { ValidationError } from "./errors"
import { getSection, type SectionContext } from "./sections"
import { formatCell } from "./table"
import type { DataTable, DateRange, PageId, QueryService, SectionData } from "./types"

export const REPORT_SECTIONS = [
  "Executive Summary",
  "Unusual Activity",
  "Resource Costs",
  "Security & Access",
  "Action Items",
] as const

export type ReportSection = (typeof REPORT_SECTIONS)[number]

const SECTION_PAGES: Record<ReportSection, PageId> = {
  "Executive Summary": "home",
  "Unusual Activity": "anomalies",
  "Resource Costs": "costs",
  "Security & Access": "security",
  "Action Items": "recommendations",
}

const TABLE_PREVIEW_ROWS = 10
const TABLE_PREVIEW_COLUMNS = 4

export interface ReportOptions {
  sections: readonly string[]
  range: DateRange
  query: QueryService
  database: string
  schema: string
  generatedAt?: Date
}

export function isReportSection(value: string): value is ReportSection {
  return REPORT_SECTIONS.some((section) => section === value)
}

export function reportFileName(range: DateRange): string {
  return `Business_Report_${formatCompactDate(range.start)}_${formatCompactDate(range.end)}.pdf`
}

function validateSections(sections: readonly string[]): ReportSection[] {
  if (sections.length === 0) {
    throw new ValidationError("sections", "select at least one section")
  }
  return sections.map((name) => {
    if (!isReportSection(name)) {
      throw new ValidationError(
        "sections",
        `unknown section '${name}'. Expected one of: ${REPORT_SECTIONS.join(", ")}`,
      )
    }
    return name
  })
}

function renderPdf(draw: (doc: PDFKit.PDFDocument) => void, title: string, date: Date): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const doc = new PDFDocument({
      size: "A4",
      margin: 50,
      info: { Title: title, CreationDate: date },
    })
    const chunks: Buffer[] = []
    doc.on("data", (chunk: Buffer) => chunks.push(chunk))
    doc.on("end", () => resolve(Buffer.concat(chunks)))
    doc.on("error", reject)
    draw(doc)
    doc.end()
  })
}

function drawTable(doc: PDFKit.PDFDocument, table: DataTable): void {
  doc.font("Helvetica-Bold").fontSize(11).text(table.name)
  if (table.rows.length === 0) {
    doc.font("Helvetica-Oblique").fontSize(9).text("No rows for this period.")
    doc.moveDown(0.5)
    return
  }

  const columns = table.columns.slice(0, TABLE_PREVIEW_COLUMNS)
  doc.font("Helvetica-Bold").fontSize(8).text(columns.join("  |  "))
  doc.font("Helvetica").fontSize(8)
  for (const row of table.rows.slice(0, TABLE_PREVIEW_ROWS)) {
    doc.text(columns.map((column) => formatCell(row[column] ?? null)).join("  |  "))
  }
  if (table.rowCount > TABLE_PREVIEW_ROWS) {
    doc.font("Helvetica-Oblique").text(`... ${table.rowCount - TABLE_PREVIEW_ROWS} more rows`)
  }
  doc.moveDown(0.5)
}

function drawSection(doc: PDFKit.PDFDocument, name: ReportSection, data: SectionData): void {
  doc.font("Helvetica-Bold").fontSize(16).text(name)
  doc.moveDown(0.5)

  if (data.emptyMessage) {
    doc.font("Helvetica").fontSize(10).text(data.emptyMessage)
  }
  for (const metric of data.metrics) {
    doc.font("Helvetica").fontSize(10).text(`${metric.label}: ${metric.value}`)
  }
  doc.moveDown(0.5)

  for (const table of data.tables) {
    drawTable(doc, table)
  }

  const failed = Object.keys(data.failures)
  if (failed.length > 0) {
    doc.font("Helvetica-Oblique").fontSize(9).text(`Unavailable: ${failed.join(", ")}`)
  }
}

/**
 * Builds a PDF business report for the selected sections, in the order
 * given. Each section reads the same views as its dashboard page.
 */
export async function generateReport(options: ReportOptions): Promise<Buffer> {
  const sections = validateSections(options.sections)
  const ctx: SectionContext = {
    query: options.query,
    range: options.range,
    database: options.database,
    schema: options.schema,
  }

  const loaded: Array<[ReportSection, SectionData]> = []
  for (const name of sections) {
    loaded.push([name, await getSection(SECTION_PAGES[name]).load(ctx)])
  }

  const generatedAt = options.generatedAt ?? new Date()
  const { range } = options
  const title = "Business Intelligence Report"

  return renderPdf(
    (doc) => {
      doc.font("Helvetica-Bold").fontSize(22).text(title, { align: "center" })
      doc
        .font("Helvetica")
        .fontSize(11)
        .text(
          `${formatLongDate(range.start)} to ${formatLongDate(range.end)} (${dayCount(range)} days)`,
          { align: "center" },
        )
      doc.moveDown(2)

      loaded.forEach(([name, data], i) => {
        if (i > 0) doc.addPage()
        drawSection(doc, name, data)
      })
    },
    title,
    generatedAt,
  )
}
