import type { StatementFormat } from "./types";
import { cell, parseBrazilianAmount, periodFromParts } from "./numbers";

const FILE_PATTERN = /^fatura-inter-(\d{4})-(\d{2})\.csv$/;

// Banco Inter credit card export: UTF-8 with BOM, comma separated
export const interFormat: StatementFormat = {
  name: "inter",
  origin: "Inter",
  filePattern: FILE_PATTERN,
  delimiter: ",",
  requiredColumns: ["Data", "Lançamento", "Categoria", "Tipo", "Valor"],

  periodFromFileName(fileName) {
    const match = FILE_PATTERN.exec(fileName);
    if (!match) return undefined;
    const [, year, month] = match;
    return periodFromParts(year, month);
  },

  mapRow(row) {
    return {
      date: row["Data"] ?? "",
      description: row["Lançamento"] ?? "",
      amountText: row["Valor"] ?? "",
      notes: `Original category: ${cell(row, "Categoria")} | Type: ${cell(row, "Tipo")}`,
    };
  },

  parseAmount: parseBrazilianAmount,
};
