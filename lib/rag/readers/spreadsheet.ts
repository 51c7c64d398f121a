import * as XLSX from "xlsx";
import type { FileType } from "../types";
import type { FormatReader, ReaderOutput } from "./types";

/**
 * CSV and XLSX reader using SheetJS. Each row becomes one comma-separated
 * line; workbooks with several sheets get a heading per sheet.
 */
export const spreadsheetReader: FormatReader = {
  extensions: [".csv", ".xlsx"],

  fileTypeFor(extension: string): FileType {
    return extension === ".csv" ? "csv" : "xlsx";
  },

  async read(buffer: Buffer, extension: string): Promise<ReaderOutput> {
    const workbook = XLSX.read(buffer, {
      type: "buffer",
      // Keep CSV cells as written ("007" stays "007")
      raw: extension === ".csv",
    });

    const sections: string[] = [];
    let rowCount = 0;

    for (const sheetName of workbook.SheetNames) {
      const sheet = workbook.Sheets[sheetName];
      if (!sheet) continue;

      const rows = XLSX.utils
        .sheet_to_csv(sheet, { blankrows: false })
        .split("\n")
        .filter((row) => row.replace(/,/g, "").trim().length > 0);

      rowCount += rows.length;
      const body = rows.join("\n");
      sections.push(
        workbook.SheetNames.length > 1 ? `## ${sheetName}\n${body}` : body
      );
    }

    const title = workbook.Props?.Title;

    return {
      text: sections.join("\n\n"),
      title: typeof title === "string" && title.trim() ? title.trim() : undefined,
      rowCount,
    };
  },
};
