import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import type { AuditResult, BatchResult, LoadedPage } from "./audit/types";
import { pageSlug } from "./audit/url-utils";
import { generateBatchCsv, generateBatchSummaryMarkdown, generateMarkdownReport } from "./export";

/** Compact local-free stamp: 2026-10-18T09:05:03.120Z -> 20261018_090503 */
export function fileStamp(date: Date = new Date()): string {
  return date.toISOString().replace(/\.\d+Z$/, "").replace(/[-:]/g, "").replace("T", "_");
}

async function writeArtifact(filePath: string, contents: string | Buffer): Promise<string> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, contents);
  return filePath;
}

export class ArtifactWriter {
  constructor(private readonly outputDir: string) {}

  /** Writes whichever screenshots the loader captured and returns their paths. */
  async saveScreenshots(page: LoadedPage, date: Date = new Date()): Promise<string[]> {
    const slug = pageSlug(page.url);
    const stamp = fileStamp(date);
    const saved: string[] = [];

    for (const [viewport, shot] of Object.entries(page.screenshots)) {
      if (shot.status !== "present") continue;
      const filePath = path.join(this.outputDir, "screenshots", `${slug}_${viewport}_${stamp}.png`);
      saved.push(await writeArtifact(filePath, shot.value));
    }
    return saved;
  }

  async saveReport(result: AuditResult, date: Date = new Date()): Promise<string> {
    const filePath = path.join(this.outputDir, "reports", `audit_${pageSlug(result.url)}_${fileStamp(date)}.md`);
    return writeArtifact(filePath, generateMarkdownReport(result));
  }

  async saveBatchSummary(
    batch: BatchResult,
    options: { inputFile?: string; reportPaths?: Record<string, string> } = {},
    date: Date = new Date()
  ): Promise<{ csvPath: string; markdownPath: string }> {
    const stamp = fileStamp(date);
    const dir = path.join(this.outputDir, "batch_results");
    const csvPath = await writeArtifact(
      path.join(dir, `summary_${stamp}.csv`),
      generateBatchCsv(batch, { reportPaths: options.reportPaths })
    );
    const markdownPath = await writeArtifact(
      path.join(dir, `summary_${stamp}.md`),
      generateBatchSummaryMarkdown(batch, { ...options, csvPath })
    );
    return { csvPath, markdownPath };
  }
}
