import { writeFileSync } from "node:fs"
import { generateReport, REPORT_SECTIONS, reportFileName } from "@behavior-intel/sdk"
import { Command } from "commander"
import { loadSettings } from "../config/settings"
import { withErrorHandler } from "../errors"
import { formatRange } from "../utils/format"
import { log } from "../utils/logger"
import { createSpinner } from "../utils/spinner"
import { resolveRange, sectionContext } from "./shared"

interface ReportOptions {
  sections: string[]
  start?: string
  end?: string
  output?: string
}

export const report = new Command("report")
  .description("Export a PDF business report")
  .option(
    "--sections <names...>",
    `Sections to include (${REPORT_SECTIONS.map((s) => `"${s}"`).join(", ")})`,
    [...REPORT_SECTIONS],
  )
  .option("--start <date>", "First day of the range (YYYY-MM-DD)")
  .option("--end <date>", "Last day of the range (YYYY-MM-DD)")
  .option("-o, --output <file>", "Output file (default Business_Report_<start>_<end>.pdf)")
  .action(
    withErrorHandler(async (options: ReportOptions) => {
      const settings = loadSettings()
      const range = resolveRange(settings, options)
      const ctx = sectionContext(settings, range)

      const spinner = createSpinner({ showElapsed: true })
      spinner.start("Generating report...")
      let pdf: Buffer
      try {
        pdf = await generateReport({ sections: options.sections, ...ctx })
      } finally {
        spinner.stop()
      }

      const output = options.output ?? reportFileName(range)
      writeFileSync(output, pdf)
      log.success(`Report for ${formatRange(range)} saved to ${output}`)
    }),
  )
