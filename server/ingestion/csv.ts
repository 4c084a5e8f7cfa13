import fs from "fs";
import path from "path";
import Papa from "papaparse";
import type { ParsedFile, RawStatementRow, SkippedFile } from "./types";
import type { StatementCsvRow, StatementFormat, StatementFormatRegistry } from "./formats";
import { formatRegistry } from "./formats";
import { warn } from "../log";

export type StatementFileResult =
  | { ok: true; file: ParsedFile; rows: RawStatementRow[] }
  | { ok: false; skipped: SkippedFile };

function stripByteOrderMark(content: string): string {
  return content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
}

export function parseStatementCSV(
  content: string,
  format: StatementFormat,
  context: { file: string; period: string }
): { rows: RawStatementRow[]; missingColumns: string[] } {
  const results = Papa.parse<StatementCsvRow>(stripByteOrderMark(content), {
    header: true,
    delimiter: format.delimiter,
    skipEmptyLines: "greedy",
    transformHeader: (header) => header.trim(),
  });

  const columns = results.meta.fields ?? [];
  const missingColumns = format.requiredColumns.filter((column) => !columns.includes(column));
  if (missingColumns.length > 0) {
    return { rows: [], missingColumns };
  }

  if (results.errors.length > 0) {
    warn(`${context.file}: ${results.errors.length} malformed line(s) read as-is`, "parser");
  }

  const rows: RawStatementRow[] = results.data.map((row, index) => {
    const mapped = format.mapRow(row);
    const amount = format.parseAmount(mapped.amountText);
    const notes =
      amount === null
        ? `${mapped.notes} | Amount parse failure: "${mapped.amountText.trim()}"`
        : mapped.notes;

    return {
      file: context.file,
      row: index + 1,
      date: mapped.date,
      description: mapped.description,
      amount,
      period: context.period,
      notes,
      origin: format.origin,
    };
  });

  return { rows, missingColumns: [] };
}

export async function readStatementFile(
  filePath: string,
  registry: StatementFormatRegistry = formatRegistry
): Promise<StatementFileResult> {
  const fileName = path.basename(filePath);
  const format = registry.match(fileName);
  const period = format?.periodFromFileName(fileName);

  if (!format || !period) {
    return {
      ok: false,
      skipped: {
        file: fileName,
        code: "UNRECOGNIZED_FILE",
        reason: "file name does not match any known statement format",
      },
    };
  }

  let content: string;
  try {
    content = await fs.promises.readFile(filePath, "utf8");
  } catch (error) {
    return {
      ok: false,
      skipped: {
        file: fileName,
        code: "FILE_READ_FAILED",
        reason: error instanceof Error ? error.message : String(error),
      },
    };
  }

  const { rows, missingColumns } = parseStatementCSV(content, format, { file: fileName, period });
  if (missingColumns.length > 0) {
    return {
      ok: false,
      skipped: {
        file: fileName,
        code: "MISSING_COLUMNS",
        reason: `missing column(s): ${missingColumns.join(", ")}`,
      },
    };
  }

  return {
    ok: true,
    file: { file: fileName, format: format.name, origin: format.origin, period, rows: rows.length },
    rows,
  };
}
