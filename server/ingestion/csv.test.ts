import fs from "fs";
import os from "os";
import path from "path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { parseStatementCSV, readStatementFile } from "./csv";
import { interFormat, c6Format } from "./formats";

const INTER_CSV =
  "\uFEFFData,Lançamento,Categoria,Tipo,Valor\n" +
  '01/10/2025,POSTO SHELL,Transporte,Compra à vista,"R$ 150,00"\n' +
  "02/10/2025,PADARIA,Alimentação,Compra à vista,R$ abc\n";

const C6_CSV =
  "Data de Compra;Nome no Cartão;Final do Cartão;Categoria;Descrição;Parcela;Valor (em US$);Cotação (em R$);Valor (em R$)\n" +
  "05/09/2025;TEST USER;1234;Restaurante;IFOOD CLUB;Única;0;0;45.90\n" +
  "\n" +
  "06/09/2025;TEST USER;1234;Lojas;LOJA ONLINE;1/3;0;0;120.00\n";

describe("parseStatementCSV", () => {
  it("reads an Inter export with byte-order mark", () => {
    const { rows, missingColumns } = parseStatementCSV(INTER_CSV, interFormat, {
      file: "fatura-inter-2025-10.csv",
      period: "10/2025",
    });

    expect(missingColumns).toEqual([]);
    expect(rows).toHaveLength(2);
    expect(rows[0]).toEqual({
      file: "fatura-inter-2025-10.csv",
      row: 1,
      date: "01/10/2025",
      description: "POSTO SHELL",
      amount: 150,
      period: "10/2025",
      notes: "Original category: Transporte | Type: Compra à vista",
      origin: "Inter",
    });
  });

  it("keeps rows whose amount fails to parse and notes the failure", () => {
    const { rows } = parseStatementCSV(INTER_CSV, interFormat, {
      file: "fatura-inter-2025-10.csv",
      period: "10/2025",
    });

    expect(rows[1].amount).toBeNull();
    expect(rows[1].notes).toBe(
      'Original category: Alimentação | Type: Compra à vista | Amount parse failure: "R$ abc"'
    );
  });

  it("stamps the file period on every row and skips blank lines", () => {
    const { rows } = parseStatementCSV(C6_CSV, c6Format, { file: "Fatura_2025-10-10.csv", period: "10/2025" });

    expect(rows.map((row) => [row.row, row.description, row.amount, row.period])).toEqual([
      [1, "IFOOD CLUB", 45.9, "10/2025"],
      [2, "LOJA ONLINE", 120, "10/2025"],
    ]);
    expect(rows[1].notes).toBe("Original category: Lojas | Installment: 1/3");
  });

  it("reports missing columns instead of rows", () => {
    const content = "Data de Compra;Descrição;Valor (em R$)\n05/09/2025;IFOOD;45.90\n";
    const result = parseStatementCSV(content, c6Format, { file: "Fatura_2025-10-10.csv", period: "10/2025" });

    expect(result.rows).toEqual([]);
    expect(result.missingColumns).toEqual(["Categoria", "Parcela"]);
  });
});

describe("readStatementFile", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "ledger-csv-"));
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  it("parses a recognized file", async () => {
    const filePath = path.join(dir, "Fatura_2025-10-10.csv");
    await fs.promises.writeFile(filePath, C6_CSV, "utf8");

    const result = await readStatementFile(filePath);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.file).toEqual({
        file: "Fatura_2025-10-10.csv",
        format: "c6",
        origin: "C6",
        period: "10/2025",
        rows: 2,
      });
      expect(result.rows).toHaveLength(2);
    }
  });

  it("skips unrecognized file names", async () => {
    const filePath = path.join(dir, "extrato.csv");
    await fs.promises.writeFile(filePath, C6_CSV, "utf8");

    const result = await readStatementFile(filePath);

    expect(result).toEqual({
      ok: false,
      skipped: {
        file: "extrato.csv",
        code: "UNRECOGNIZED_FILE",
        reason: "file name does not match any known statement format",
      },
    });
  });

  it("reports unreadable files", async () => {
    const result = await readStatementFile(path.join(dir, "fatura-inter-2025-10.csv"));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.skipped.code).toBe("FILE_READ_FAILED");
    }
  });

  it("reports files with missing columns", async () => {
    const filePath = path.join(dir, "fatura-inter-2025-10.csv");
    await fs.promises.writeFile(filePath, "Data,Valor\n01/10/2025,\"R$ 1,00\"\n", "utf8");

    const result = await readStatementFile(filePath);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.skipped).toEqual({
        file: "fatura-inter-2025-10.csv",
        code: "MISSING_COLUMNS",
        reason: "missing column(s): Lançamento, Categoria, Tipo",
      });
    }
  });
});
