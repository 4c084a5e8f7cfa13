import fs from "fs";
import os from "os";
import path from "path";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { discoverStatementFiles, runPipeline } from "./pipeline";
import { FileLedgerStorage } from "./storage";

const C6_CSV =
  "Data de Compra;Nome no Cartão;Final do Cartão;Categoria;Descrição;Parcela;Valor (em US$);Cotação (em R$);Valor (em R$)\n" +
  "05/10/2025;TEST USER;1234;Restaurante;IFOOD CLUB;Única;0;0;45.90\n" +
  "06/10/2025;TEST USER;1234;Lojas;LOJA ONLINE;1/3;0;0;120.00\n";

describe("discoverStatementFiles", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "ledger-discover-"));
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  it("lists csv files in name order", async () => {
    for (const name of ["b.csv", "a.CSV", "readme.txt"]) {
      await fs.promises.writeFile(path.join(dir, name), "", "utf8");
    }

    expect(await discoverStatementFiles(dir)).toEqual([path.join(dir, "a.CSV"), path.join(dir, "b.csv")]);
  });

  it("returns nothing for a missing folder", async () => {
    expect(await discoverStatementFiles(path.join(dir, "missing"))).toEqual([]);
  });
});

describe("runPipeline", () => {
  let dir: string;
  let storage: FileLedgerStorage;
  let files: string[];

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "ledger-pipeline-"));
    storage = new FileLedgerStorage(path.join(dir, "ledger.csv"));
    const filePath = path.join(dir, "Fatura_2025-10-10.csv");
    await fs.promises.writeFile(filePath, C6_CSV, "utf8");
    files = [filePath];
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  it("ingests then categorizes new records", async () => {
    const categorize = vi.fn(async (description: string) => (description === "IFOOD CLUB" ? "alimentacao" : "Compras"));

    const result = await runPipeline(files, storage, {
      categorizer: { categorize },
      categorization: { delayMs: 0, retryDelayMs: 0 },
    });

    expect(result.ingestion.merge).toEqual({ considered: 2, inserted: 2, duplicates: 0, total: 2 });
    expect(result.classification?.classified).toBe(2);
    expect(result.summary.uncategorizedRows).toBe(0);
    expect(result.summary.amountByCategory).toEqual({ "Alimentação": 45.9, Compras: 120 });
  });

  it("calls the service only for records it has not categorized yet", async () => {
    const categorize = vi.fn(async () => "Compras");
    const options = { categorizer: { categorize }, categorization: { delayMs: 0, retryDelayMs: 0 } };

    await runPipeline(files, storage, options);
    const second = await runPipeline(files, storage, options);

    expect(categorize).toHaveBeenCalledTimes(2);
    expect(second.ingestion.merge).toEqual({ considered: 2, inserted: 0, duplicates: 2, total: 2 });
    expect(second.classification?.serviceCalls).toBe(0);
  });

  it("stops after ingestion without a categorizer", async () => {
    const result = await runPipeline(files, storage, { categorizer: null });

    expect(result.classification).toBeNull();
    expect(result.summary.uncategorizedRows).toBe(2);
  });
});
