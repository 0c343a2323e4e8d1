import fs from "node:fs";
import path from "node:path";
import { InputNotFound, MissingColumn } from "../core/errors";
import { Logger } from "../observability";
import { parseCsv } from "./csv";

export interface CertSourceOptions {
  column: string;
  logger?: Logger;
}

/**
 * Reads certificate identifiers from the `column` of a CSV file with a header row.
 * Values are trimmed, blank cells skipped and repeated identifiers dropped so that
 * every identifier owns exactly one media directory and one output row.
 */
export function readCertIdentifiers(inputPath: string, options: CertSourceOptions): string[] {
  const absolutePath = path.resolve(inputPath);
  let content: string;
  try {
    content = fs.readFileSync(absolutePath, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      throw new InputNotFound(absolutePath);
    }
    throw error;
  }

  const rows = parseCsv(content);
  const header = (rows[0] ?? []).map((name) => name.trim());
  const columnIndex = header.indexOf(options.column);
  if (columnIndex < 0) {
    throw new MissingColumn(absolutePath, options.column, header);
  }

  const certs: string[] = [];
  const seen = new Set<string>();
  rows.slice(1).forEach((row, rowIndex) => {
    const cert = (row[columnIndex] ?? "").trim();
    if (!cert) {
      return;
    }
    if (seen.has(cert)) {
      options.logger?.warn("input_duplicate_cert_skipped", { cert, row: rowIndex + 2 });
      return;
    }
    seen.add(cert);
    certs.push(cert);
  });

  options.logger?.info("input_read", { inputPath: absolutePath, certs: certs.length });
  return certs;
}
