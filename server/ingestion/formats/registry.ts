import type { StatementFormat, StatementFormatRegistry } from "./types";
import { interFormat } from "./inter";
import { c6Format } from "./c6";

export class FormatRegistry implements StatementFormatRegistry {
  private formats: Map<string, StatementFormat> = new Map();

  register(format: StatementFormat): void {
    this.formats.set(format.name, format);
  }

  match(fileName: string): StatementFormat | undefined {
    for (const format of Array.from(this.formats.values())) {
      if (format.filePattern.test(fileName)) {
        return format;
      }
    }
    return undefined;
  }
}

export const formatRegistry = new FormatRegistry();

formatRegistry.register(interFormat);
formatRegistry.register(c6Format);
