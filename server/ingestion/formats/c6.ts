import type { StatementFormat } from "./types";
import { cell, parsePlainAmount, periodFromParts } from "./numbers";

const FILE_PATTERN = /^Fatura_(\d{4})-(\d{2})-(\d{2})\.csv$/;

// C6 Bank invoice export: plain UTF-8, semicolon separated, amount already decimal
export const c6Format: StatementFormat = {
  name: "c6",
  origin: "C6",
  filePattern: FILE_PATTERN,
  delimiter: ";",
  requiredColumns: ["Data de Compra", "Descrição", "Categoria", "Parcela", "Valor (em R$)"],

  periodFromFileName(fileName) {
    const match = FILE_PATTERN.exec(fileName);
    if (!match) return undefined;
    const [, year, month] = match;
    return periodFromParts(year, month);
  },

  mapRow(row) {
    return {
      date: row["Data de Compra"] ?? "",
      description: row["Descrição"] ?? "",
      amountText: row["Valor (em R$)"] ?? "",
      notes: `Original category: ${cell(row, "Categoria")} | Installment: ${cell(row, "Parcela")}`,
    };
  },

  parseAmount: parsePlainAmount,
};
