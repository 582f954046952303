import { randomUUID } from "crypto";
import { Pool } from "pg";
import { CATEGORY_KEYS, TIERS, emptyTierCounts } from "@shared/audit-types";
import type { AuditStatus, CategoryKey, Grade, Tier } from "@shared/audit-types";
import type { ProspectEntry, ProspectSummary } from "@shared/prospect-types";
import type { AuditLogger, AuditResult } from "./audit/types";
import { getDomainFromUrl } from "./audit/url-utils";

const MAX_MEMORY_ENTRIES = 1000;
const RECENT_LIMIT = 20;
const TOP_OPPORTUNITIES = 3;

export interface ProspectStore {
  recordAudit(result: AuditResult): Promise<ProspectEntry>;
  /** Lowest score (warmest prospect) first; failed audits last. */
  getAll(): Promise<ProspectEntry[]>;
  getSummary(): Promise<ProspectSummary>;
  /** Domains that already have a score, for resuming a batch. */
  getAuditedDomains(): Promise<Set<string>>;
  close(): Promise<void>;
}

type ProspectFields = Omit<ProspectEntry, "id" | "auditedAt">;

export function toProspectFields(result: AuditResult): ProspectFields {
  const categoryScores: Partial<Record<CategoryKey, number>> = {};
  if (result.categories) {
    for (const key of CATEGORY_KEYS) {
      categoryScores[key] = result.categories[key].score;
    }
  }

  return {
    url: result.url,
    domain: getDomainFromUrl(result.url),
    company: result.company,
    status: result.status,
    tier: result.tier ?? "FAILED",
    score: result.totalScore,
    grade: result.grade,
    categoryScores,
    topOpportunities: result.rankedOpportunities.slice(0, TOP_OPPORTUNITIES).map((opportunity) => opportunity.message),
    error: result.error,
  };
}

export function compareProspects(a: ProspectEntry, b: ProspectEntry): number {
  if (a.score === null || b.score === null) {
    if (a.score !== b.score) return a.score === null ? 1 : -1;
  } else if (a.score !== b.score) {
    return a.score - b.score;
  }
  return new Date(b.auditedAt).getTime() - new Date(a.auditedAt).getTime();
}

function summarize(entries: ProspectEntry[]): ProspectSummary {
  const countsByTier = emptyTierCounts();
  for (const entry of entries) {
    countsByTier[entry.tier] += 1;
  }

  const scores = entries.flatMap((entry) => (entry.score === null ? [] : [entry.score]));
  const avgScore = scores.length === 0 ? 0 : Math.round((scores.reduce((sum, s) => sum + s, 0) / scores.length) * 10) / 10;

  const recent = [...entries]
    .sort((a, b) => new Date(b.auditedAt).getTime() - new Date(a.auditedAt).getTime())
    .slice(0, RECENT_LIMIT);

  return { totalProspects: entries.length, avgScore, countsByTier, recent };
}

export class MemoryProspectStore implements ProspectStore {
  private entries = new Map<string, ProspectEntry>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async recordAudit(result: AuditResult): Promise<ProspectEntry> {
    const entry: ProspectEntry = {
      id: randomUUID(),
      ...toProspectFields(result),
      auditedAt: this.now().toISOString(),
    };

    // Re-inserting moves the domain to the newest position.
    this.entries.delete(entry.domain);
    this.entries.set(entry.domain, entry);

    if (this.entries.size > MAX_MEMORY_ENTRIES) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) this.entries.delete(oldest.value);
    }

    return entry;
  }

  async getAll(): Promise<ProspectEntry[]> {
    return [...this.entries.values()].sort(compareProspects);
  }

  async getSummary(): Promise<ProspectSummary> {
    return summarize([...this.entries.values()]);
  }

  async getAuditedDomains(): Promise<Set<string>> {
    return new Set([...this.entries.values()].filter((entry) => entry.score !== null).map((entry) => entry.domain));
  }

  async close(): Promise<void> {
    this.entries.clear();
  }
}

interface ProspectRow {
  id: string;
  url: string;
  domain: string;
  company: string | null;
  status: AuditStatus;
  tier: Tier | "FAILED";
  score: number | null;
  grade: Grade | null;
  category_scores: Partial<Record<CategoryKey, number>> | null;
  top_opportunities: string[] | null;
  error: string | null;
  audited_at: string | Date;
}

const PROSPECT_COLUMNS =
  "id, url, domain, company, status, tier, score, grade, category_scores, top_opportunities, error, audited_at";

/** Schema lives in migrations/0001_prospect_audits.sql. */
export class PostgresProspectStore implements ProspectStore {
  private readonly pool: Pool;

  constructor(databaseUrl: string) {
    this.pool = new Pool({ connectionString: databaseUrl });
  }

  private mapRow(row: ProspectRow): ProspectEntry {
    return {
      id: row.id,
      url: row.url,
      domain: row.domain,
      company: row.company,
      status: row.status,
      tier: row.tier,
      score: row.score,
      grade: row.grade,
      categoryScores: row.category_scores ?? {},
      topOpportunities: row.top_opportunities ?? [],
      error: row.error,
      auditedAt: new Date(row.audited_at).toISOString(),
    };
  }

  async recordAudit(result: AuditResult): Promise<ProspectEntry> {
    const fields = toProspectFields(result);

    const inserted = await this.pool.query<ProspectRow>(
      `
      INSERT INTO prospect_audits (
        url, domain, company, status, tier, score, grade, category_scores, top_opportunities, error, result_json
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8::jsonb, $9::jsonb, $10, $11::jsonb)
      ON CONFLICT (domain) DO UPDATE
      SET
        url = EXCLUDED.url,
        company = COALESCE(EXCLUDED.company, prospect_audits.company),
        status = EXCLUDED.status,
        tier = EXCLUDED.tier,
        score = EXCLUDED.score,
        grade = EXCLUDED.grade,
        category_scores = EXCLUDED.category_scores,
        top_opportunities = EXCLUDED.top_opportunities,
        error = EXCLUDED.error,
        result_json = EXCLUDED.result_json,
        audited_at = now()
      RETURNING ${PROSPECT_COLUMNS}
      `,
      [
        fields.url,
        fields.domain,
        fields.company,
        fields.status,
        fields.tier,
        fields.score,
        fields.grade,
        JSON.stringify(fields.categoryScores),
        JSON.stringify(fields.topOpportunities),
        fields.error,
        JSON.stringify(result),
      ]
    );

    return this.mapRow(inserted.rows[0]);
  }

  async getAll(): Promise<ProspectEntry[]> {
    const result = await this.pool.query<ProspectRow>(
      `SELECT ${PROSPECT_COLUMNS} FROM prospect_audits ORDER BY score ASC NULLS LAST, audited_at DESC`
    );
    return result.rows.map((row) => this.mapRow(row));
  }

  async getSummary(): Promise<ProspectSummary> {
    const [totals, tiers, recent] = await Promise.all([
      this.pool.query<{ total: string; avg_score: string | null }>(
        `SELECT COUNT(*)::text AS total, ROUND(AVG(score)::numeric, 1)::text AS avg_score FROM prospect_audits`
      ),
      this.pool.query<{ tier: string; count: string }>(
        `SELECT tier, COUNT(*)::text AS count FROM prospect_audits GROUP BY tier`
      ),
      this.pool.query<ProspectRow>(
        `SELECT ${PROSPECT_COLUMNS} FROM prospect_audits ORDER BY audited_at DESC LIMIT ${RECENT_LIMIT}`
      ),
    ]);

    const countsByTier = emptyTierCounts();
    for (const row of tiers.rows) {
      const tier = row.tier === "FAILED" ? row.tier : TIERS.find((known) => known === row.tier);
      if (tier) countsByTier[tier] = parseInt(row.count, 10);
    }

    return {
      totalProspects: parseInt(totals.rows[0]?.total ?? "0", 10),
      avgScore: parseFloat(totals.rows[0]?.avg_score ?? "0"),
      countsByTier,
      recent: recent.rows.map((row) => this.mapRow(row)),
    };
  }

  async getAuditedDomains(): Promise<Set<string>> {
    const result = await this.pool.query<{ domain: string }>(
      `SELECT domain FROM prospect_audits WHERE score IS NOT NULL`
    );
    return new Set(result.rows.map((row) => row.domain));
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

export function createProspectStore(databaseUrl: string | undefined, logger: AuditLogger = console): ProspectStore {
  if (databaseUrl) {
    logger.log("[prospects] Using Postgres prospect store.");
    return new PostgresProspectStore(databaseUrl);
  }

  logger.warn("[prospects] DATABASE_URL not set, falling back to in-memory prospect store.");
  return new MemoryProspectStore();
}
