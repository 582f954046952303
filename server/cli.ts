#!/usr/bin/env node
import { readFile } from "node:fs/promises";
import { Command } from "commander";
import { AuditConfigSchema, createAuditRuntime } from "./audit";
import type { AuditConfig } from "./audit";
import { errorMessage } from "./audit/errors";
import { targetDomain } from "./audit/url-utils";
import { ArtifactWriter } from "./artifacts";
import { loadLocalEnvFiles, readEnv } from "./config";
import { createProspectStore } from "./prospects";
import { parseTargets } from "./targets";

interface CommonOptions {
  timeoutMs: string;
  judgeTimeoutMs: string;
  renderer: string;
  model: string;
  outputDir: string;
  userAgent: string;
}

interface AuditCommandOptions extends CommonOptions {
  company?: string;
  json?: boolean;
}

interface BatchCommandOptions extends CommonOptions {
  concurrency: string;
  resume?: boolean;
}

const defaults = AuditConfigSchema.parse({});

function toConfig(options: CommonOptions, concurrency?: string): AuditConfig {
  return AuditConfigSchema.parse({
    timeoutMs: parseInt(options.timeoutMs, 10),
    judgeTimeoutMs: parseInt(options.judgeTimeoutMs, 10),
    renderer: options.renderer,
    model: options.model,
    outputDir: options.outputDir,
    userAgent: options.userAgent,
    ...(concurrency === undefined ? {} : { concurrency: parseInt(concurrency, 10) }),
  });
}

function fail(error: unknown): never {
  console.error(JSON.stringify({ error: true, message: errorMessage(error) || "Unknown error occurred" }, null, 2));
  process.exit(1);
}

function withCommonOptions(command: Command): Command {
  return command
    .option("--timeoutMs <number>", "Page load timeout in milliseconds", String(defaults.timeoutMs))
    .option("--judgeTimeoutMs <number>", "Design judgment timeout in milliseconds", String(defaults.judgeTimeoutMs))
    .option("--renderer <renderer>", "Page renderer: browser or fetch", defaults.renderer)
    .option("--model <model>", "Vision model used to judge design", defaults.model)
    .option("--outputDir <dir>", "Directory for screenshots, reports and summaries", defaults.outputDir)
    .option("--userAgent <string>", "User agent string", defaults.userAgent);
}

const program = new Command();

program
  .name("prospect-audit")
  .description("Audit accounting firm websites and rank them as outreach prospects")
  .version("1.0.0");

withCommonOptions(
  program
    .command("audit")
    .description("Audit a single website")
    .argument("<url>", "Website to audit; https:// is assumed when no scheme is given")
    .option("--company <name>", "Company name to show in the report")
    .option("--json", "Print the full result as JSON")
).action(async (url: string, options: AuditCommandOptions) => {
  try {
    loadLocalEnvFiles();
    const env = readEnv();
    const config = toConfig(options);
    const writer = new ArtifactWriter(config.outputDir);

    const runtime = await createAuditRuntime({
      config,
      apiKey: env.ANTHROPIC_API_KEY,
      executablePath: env.CHROMIUM_PATH,
      onPageLoaded: async (page) => {
        await writer.saveScreenshots(page);
      },
    });

    try {
      const result = await runtime.auditor.audit({ url, company: options.company });
      const reportPath = await writer.saveReport(result);

      if (env.DATABASE_URL) {
        const store = createProspectStore(env.DATABASE_URL);
        await store.recordAudit(result);
        await store.close();
      }

      if (options.json) {
        console.log(JSON.stringify({ ...result, reportPath }, null, 2));
      } else if (result.status === "failed") {
        console.log(`Audit failed (${result.failure.kind}): ${result.error}`);
      } else {
        console.log(`Grade: ${result.grade} | Score: ${result.totalScore}/100 | Recommendation: ${result.tier}`);
        console.log(result.gradeSummary);
        if (result.error) console.log(result.error);
        console.log(`Report saved to: ${reportPath}`);
      }

      process.exitCode = result.status === "failed" ? 1 : 0;
    } finally {
      await runtime.close();
    }
  } catch (error) {
    fail(error);
  }
});

withCommonOptions(
  program
    .command("batch")
    .description("Audit every website listed in a CSV (url, company_name, notes) or plain-text file")
    .argument("<file>", "Input list")
    .option("--concurrency <number>", "Number of sites audited at once", String(defaults.concurrency))
    .option("--resume", "Skip sites that already have a score in the prospect store")
).action(async (file: string, options: BatchCommandOptions) => {
  try {
    loadLocalEnvFiles();
    const env = readEnv();
    const config = toConfig(options, options.concurrency);
    const targets = parseTargets(await readFile(file, "utf-8"));

    if (targets.length === 0) {
      fail(new Error(`No URLs found in ${file}; expected a 'url' column or one URL per line`));
    }

    const store = createProspectStore(env.DATABASE_URL);
    if (options.resume && !env.DATABASE_URL) {
      console.warn("[batch] --resume only has an effect with DATABASE_URL set");
    }
    const audited = options.resume ? await store.getAuditedDomains() : new Set<string>();

    const writer = new ArtifactWriter(config.outputDir);
    const runtime = await createAuditRuntime({
      config,
      apiKey: env.ANTHROPIC_API_KEY,
      executablePath: env.CHROMIUM_PATH,
      onPageLoaded: async (page) => {
        await writer.saveScreenshots(page);
      },
    });

    const controller = new AbortController();
    process.once("SIGINT", () => {
      console.warn("\n[batch] Interrupted: finishing in-flight audits, no new sites will start");
      controller.abort();
    });

    try {
      const reportPaths: Record<string, string> = {};
      const batch = await runtime.createBatch().run(targets, {
        signal: controller.signal,
        skip: (target) => audited.has(targetDomain(target.url)),
        onProgress: ({ completed, total, countsByTier, latest }) => {
          const counts = Object.entries(countsByTier)
            .map(([tier, count]) => `${tier}: ${count}`)
            .join(" | ");
          console.log(`[${completed}/${total}] ${latest.company || latest.url} -> ${latest.tier ?? "FAILED"} (${counts})`);
        },
      });

      for (const item of batch.items) {
        if (item.status === "failed" && item.failure.kind === "cancelled") continue;
        reportPaths[item.url] = await writer.saveReport(item);
        await store.recordAudit(item);
      }

      const { csvPath, markdownPath } = await writer.saveBatchSummary(batch, { inputFile: file, reportPaths });
      console.log(`CSV summary: ${csvPath}`);
      console.log(`Markdown summary: ${markdownPath}`);

      process.exitCode = batch.cancelled ? 130 : 0;
    } finally {
      await runtime.close();
      await store.close();
    }
  } catch (error) {
    fail(error);
  }
});

program.parseAsync().catch(fail);
