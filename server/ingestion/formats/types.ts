export type StatementCsvRow = Record<string, string | undefined>;

export interface MappedRow {
  date: string;
  description: string;
  amountText: string;
  notes: string;
}

export interface StatementFormat {
  name: string;
  origin: string;
  filePattern: RegExp;
  delimiter: string;
  requiredColumns: string[];
  // MM/yyyy bucket encoded in the file name, undefined when the name does not match
  periodFromFileName(fileName: string): string | undefined;
  mapRow(row: StatementCsvRow): MappedRow;
  parseAmount(text: string): number | null;
}

export interface StatementFormatRegistry {
  register(format: StatementFormat): void;
  match(fileName: string): StatementFormat | undefined;
}
