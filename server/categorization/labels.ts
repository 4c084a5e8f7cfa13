import { CATEGORIES, UNCATEGORIZED_OTHER } from "@shared/schema";
import type { Category } from "@shared/schema";

// Spelling variants the service tends to answer with, keyed by their title-cased form
const CATEGORY_SYNONYMS: Record<string, Category> = {
  Alimentacao: "Alimentação",
  Educacao: "Educação",
  Saude: "Saúde",
  Servicos: "Serviços",
  Investimento: "Investimentos",
  Outro: "Outros",
  Other: "Outros",
};

const KNOWN_CATEGORIES: ReadonlySet<string> = new Set(CATEGORIES);

function isCategory(value: string): value is Category {
  return KNOWN_CATEGORIES.has(value);
}

export function titleCase(value: string): string {
  return value
    .toLowerCase()
    .replace(/(^|[^\p{L}])(\p{L})/gu, (_match, boundary: string, letter: string) => boundary + letter.toUpperCase());
}

export interface NormalizedCategory {
  category: Category;
  recognized: boolean;
}

export function normalizeCategory(raw: string | null | undefined): NormalizedCategory {
  const cleaned = (raw ?? "")
    .trim()
    .replace(/^["'`]+|["'`.]+$/g, "")
    .trim();

  if (!cleaned) {
    return { category: UNCATEGORIZED_OTHER, recognized: false };
  }

  const titled = titleCase(cleaned);
  const mapped = CATEGORY_SYNONYMS[titled] ?? titled;

  if (isCategory(mapped)) {
    return { category: mapped, recognized: true };
  }
  return { category: UNCATEGORIZED_OTHER, recognized: false };
}
