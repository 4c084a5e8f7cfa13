const GROUPED_DECIMAL = /^-?\d{1,3}(\.\d{3})*(,\d+)?$/;
const UNGROUPED_DECIMAL = /^-?\d+(,\d+)?$/;
const PLAIN_DECIMAL = /^-?\d+(\.\d+)?$/;

/**
 * Reads amounts written the Brazilian way: optional "R$", "." for thousands
 * and "," for decimals ("R$ 1.234,56", "-R$ 10,00").
 */
export function parseBrazilianAmount(value: string): number | null {
  const cleaned = value.replace(/R\$/g, "").replace(/\s/g, "");

  if (!GROUPED_DECIMAL.test(cleaned) && !UNGROUPED_DECIMAL.test(cleaned)) {
    return null;
  }

  const amount = Number(cleaned.replace(/\./g, "").replace(",", "."));
  return Number.isFinite(amount) ? amount : null;
}

export function parsePlainAmount(value: string): number | null {
  const cleaned = value.trim();
  if (!PLAIN_DECIMAL.test(cleaned)) {
    return null;
  }
  const amount = Number(cleaned);
  return Number.isFinite(amount) ? amount : null;
}

export function periodFromParts(year: string, month: string): string | undefined {
  const monthNumber = Number(month);
  if (monthNumber < 1 || monthNumber > 12) {
    return undefined;
  }
  return `${month}/${year}`;
}

// Missing cells come through as undefined or as the text "nan"
export function cell(row: Record<string, string | undefined>, column: string): string {
  const value = row[column];
  if (value === undefined) return "";
  const trimmed = value.trim();
  return trimmed.toLowerCase() === "nan" ? "" : trimmed;
}
