export * from "./types";
export { formatRegistry, FormatRegistry } from "./registry";
export { interFormat } from "./inter";
export { c6Format } from "./c6";
export { parseBrazilianAmount, parsePlainAmount } from "./numbers";
