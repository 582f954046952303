import type { AuditTarget } from "./audit/types";
import { normalizeTargetUrl } from "./audit/url-utils";

export function splitCsvLine(line: string): string[] {
  const cells: string[] = [];
  let current = "";
  let quoted = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];
    if (quoted) {
      if (char === '"' && line[i + 1] === '"') {
        current += '"';
        i++;
      } else if (char === '"') {
        quoted = false;
      } else {
        current += char;
      }
    } else if (char === '"') {
      quoted = true;
    } else if (char === ",") {
      cells.push(current.trim());
      current = "";
    } else {
      current += char;
    }
  }

  cells.push(current.trim());
  return cells;
}

function meaningfulLines(text: string): string[] {
  return text
    .replace(/^\uFEFF/, "")
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== "" && !line.startsWith("#"));
}

function fromCsv(header: string[], rows: string[]): AuditTarget[] {
  const column = (name: string) => header.findIndex((cell) => cell.toLowerCase() === name);
  const urlIndex = column("url");
  const companyIndex = column("company_name");
  const notesIndex = column("notes");

  const targets: AuditTarget[] = [];
  for (const row of rows) {
    const cells = splitCsvLine(row);
    const url = cells[urlIndex] ?? "";
    if (!url) continue;

    const target: AuditTarget = { url };
    const company = companyIndex >= 0 ? cells[companyIndex] : undefined;
    const notes = notesIndex >= 0 ? cells[notesIndex] : undefined;
    if (company) target.company = company;
    if (notes) target.notes = notes;
    targets.push(target);
  }
  return targets;
}

/**
 * Reads a prospect list: a CSV with a `url` column (plus optional
 * `company_name` and `notes`), or plain text with one URL per line.
 * Repeats of the same site are dropped, keeping the first.
 */
export function parseTargets(text: string): AuditTarget[] {
  const lines = meaningfulLines(text);
  if (lines.length === 0) return [];

  const header = splitCsvLine(lines[0]);
  const isCsv = header.some((cell) => cell.toLowerCase() === "url");
  const targets = isCsv ? fromCsv(header, lines.slice(1)) : lines.map((url) => ({ url }));

  const seen = new Set<string>();
  return targets.filter((target) => {
    const key = normalizeTargetUrl(target.url) ?? target.url.toLowerCase();
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}
