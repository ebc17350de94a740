import { SECTIONS } from "@behavior-intel/sdk"
import { Command } from "commander"
import pc from "picocolors"
import { withErrorHandler } from "../errors"
import { createTable } from "../utils/table"

export const pages = new Command("pages")
  .description("List dashboard pages")
  .option("--json", "Output as JSON")
  .action(
    withErrorHandler(async (options: { json?: boolean }) => {
      if (options.json) {
        const list = SECTIONS.map(({ id, title, pageContext }) => ({ id, title, pageContext }))
        console.log(JSON.stringify(list, null, 2))
        return
      }

      const table = createTable([pc.bold("Page"), pc.bold("Title")])
      for (const section of SECTIONS) {
        table.push([section.id, section.title])
      }
      console.log(table.toString())
      console.log(pc.dim("\nShow one with: behavior-intel show <page>"))
    }),
  )
