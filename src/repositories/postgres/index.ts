import type { Pool } from "pg";
import type {
  CitationLedgerRecord,
  DeliveryRecord,
  FetchAttemptRecord,
  FetchJob,
  ResearchTask,
  ValidatedContent,
} from "../../types/research";
import { isoFrom } from "../../utils/time";
import type {
  ClaimInput,
  ClaimResult,
  CitationLedgerRepository,
  CreateTaskInput,
  DeliveryRepository,
  JobTarget,
  LedgerEntryInput,
  Repositories,
  ResearchRepository,
  TaskPatch,
} from "../types";

type Timestamp = string | Date;

interface TaskRow extends Omit<ResearchTask, "deadline_at" | "created_at" | "updated_at" | "completed_at"> {
  deadline_at: Timestamp | null;
  created_at: Timestamp;
  updated_at: Timestamp;
  completed_at: Timestamp | null;
}

interface JobRow extends Omit<FetchJob, "next_eligible_at" | "created_at" | "updated_at"> {
  next_eligible_at: Timestamp | null;
  created_at: Timestamp;
  updated_at: Timestamp;
}

interface AttemptRow extends Omit<FetchAttemptRecord, "started_at" | "ended_at"> {
  started_at: Timestamp;
  ended_at: Timestamp;
}

interface ContentRow extends Omit<ValidatedContent, "created_at"> {
  created_at: Timestamp;
}

interface DeliveryRow extends Omit<DeliveryRecord, "lease_expires_at" | "created_at" | "updated_at"> {
  lease_expires_at: Timestamp;
  created_at: Timestamp;
  updated_at: Timestamp;
}

interface LedgerRow extends Omit<CitationLedgerRecord, "accessed_at" | "created_at"> {
  accessed_at: Timestamp;
  created_at: Timestamp;
}

const optionalIso = (value: Timestamp | null) => (value === null ? null : isoFrom(value));

function toTask(row: TaskRow): ResearchTask {
  return {
    ...row,
    deadline_at: optionalIso(row.deadline_at),
    created_at: isoFrom(row.created_at),
    updated_at: isoFrom(row.updated_at),
    completed_at: optionalIso(row.completed_at),
  };
}

function toJob(row: JobRow): FetchJob {
  return {
    ...row,
    next_eligible_at: optionalIso(row.next_eligible_at),
    created_at: isoFrom(row.created_at),
    updated_at: isoFrom(row.updated_at),
  };
}

function toAttempt(row: AttemptRow): FetchAttemptRecord {
  return { ...row, started_at: isoFrom(row.started_at), ended_at: isoFrom(row.ended_at) };
}

function toContent(row: ContentRow): ValidatedContent {
  return { ...row, created_at: isoFrom(row.created_at) };
}

function toDelivery(row: DeliveryRow): DeliveryRecord {
  return {
    ...row,
    lease_expires_at: isoFrom(row.lease_expires_at),
    created_at: isoFrom(row.created_at),
    updated_at: isoFrom(row.updated_at),
  };
}

function toLedger(row: LedgerRow): CitationLedgerRecord {
  return { ...row, accessed_at: isoFrom(row.accessed_at), created_at: isoFrom(row.created_at) };
}

const TASK_COLUMNS = [
  "status",
  "cancel_requested",
  "deadline_at",
  "summary",
  "warnings",
  "notes",
  "completed_at",
] as const satisfies readonly (keyof TaskPatch)[];

export class PostgresResearchRepository implements ResearchRepository {
  constructor(private readonly pool: Pool) {}

  async createTask(input: CreateTaskInput): Promise<ResearchTask> {
    const { rows } = await this.pool.query<TaskRow>(
      `INSERT INTO research_tasks (query, target_urls, deadline_at)
       VALUES ($1, $2, $3)
       RETURNING *`,
      [input.query, JSON.stringify(input.targetUrls), input.deadlineAt],
    );
    return toTask(rows[0]);
  }

  async getTask(taskId: string): Promise<ResearchTask | null> {
    const { rows } = await this.pool.query<TaskRow>("SELECT * FROM research_tasks WHERE id = $1", [taskId]);
    return rows[0] ? toTask(rows[0]) : null;
  }

  async updateTask(taskId: string, patch: TaskPatch): Promise<ResearchTask> {
    const updates: string[] = ["updated_at = now()"];
    const values: unknown[] = [taskId];
    let idx = values.length + 1;
    for (const column of TASK_COLUMNS) {
      const value = patch[column];
      if (value === undefined) continue;
      updates.push(`${column} = $${idx++}`);
      const jsonb = column === "summary" || column === "warnings" || column === "notes";
      values.push(jsonb && value !== null ? JSON.stringify(value) : value);
    }
    const { rows } = await this.pool.query<TaskRow>(
      `UPDATE research_tasks SET ${updates.join(", ")} WHERE id = $1 RETURNING *`,
      values,
    );
    if (!rows[0]) {
      throw new Error(`Task ${taskId} not found`);
    }
    return toTask(rows[0]);
  }

  async listRecentTasks(limit: number): Promise<ResearchTask[]> {
    const { rows } = await this.pool.query<TaskRow>(
      "SELECT * FROM research_tasks ORDER BY created_at DESC LIMIT $1",
      [limit],
    );
    return rows.map(toTask);
  }

  async listActiveTasks(): Promise<ResearchTask[]> {
    const { rows } = await this.pool.query<TaskRow>(
      `SELECT * FROM research_tasks
       WHERE status NOT IN ('complete', 'failed')
       ORDER BY created_at`,
    );
    return rows.map(toTask);
  }

  async createJobs(taskId: string, targets: JobTarget[], attemptTimeoutMs: number | null): Promise<FetchJob[]> {
    if (!targets.length) {
      return [];
    }
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      const jobs: FetchJob[] = [];
      for (const target of targets) {
        const { rows } = await client.query<JobRow>(
          `INSERT INTO fetch_jobs (task_id, target_url, domain, attempt_timeout_ms)
           VALUES ($1, $2, $3, $4)
           RETURNING *`,
          [taskId, target.url, target.domain, attemptTimeoutMs],
        );
        jobs.push(toJob(rows[0]));
      }
      await client.query("COMMIT");
      return jobs;
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }
  }

  async getJob(jobId: string): Promise<FetchJob | null> {
    const { rows } = await this.pool.query<JobRow>("SELECT * FROM fetch_jobs WHERE id = $1", [jobId]);
    return rows[0] ? toJob(rows[0]) : null;
  }

  async listJobs(taskId: string): Promise<FetchJob[]> {
    const { rows } = await this.pool.query<JobRow>(
      "SELECT * FROM fetch_jobs WHERE task_id = $1 ORDER BY created_at, target_url",
      [taskId],
    );
    return rows.map(toJob);
  }

  async saveJob(job: FetchJob): Promise<void> {
    await this.pool.query(
      `UPDATE fetch_jobs
          SET strategy_index = $2, attempt_count = $3, total_attempts = $4, state = $5,
              last_failure = $6, next_eligible_at = $7, attempt_timeout_ms = $8,
              abandon_reason = $9, delivery_status = $10, citation_id = $11, updated_at = $12
        WHERE id = $1`,
      [
        job.id,
        job.strategy_index,
        job.attempt_count,
        job.total_attempts,
        job.state,
        job.last_failure,
        job.next_eligible_at,
        job.attempt_timeout_ms,
        job.abandon_reason,
        job.delivery_status,
        job.citation_id,
        job.updated_at,
      ],
    );
  }

  async insertAttempt(attempt: Omit<FetchAttemptRecord, "id">): Promise<FetchAttemptRecord> {
    const { rows } = await this.pool.query<AttemptRow>(
      `INSERT INTO fetch_attempts
       (job_id, attempt_number, strategy, strategy_index, started_at, ended_at, outcome, verdict, rule, raw_storage_url)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
       RETURNING *`,
      [
        attempt.job_id,
        attempt.attempt_number,
        attempt.strategy,
        attempt.strategy_index,
        attempt.started_at,
        attempt.ended_at,
        JSON.stringify(attempt.outcome),
        attempt.verdict,
        attempt.rule,
        attempt.raw_storage_url,
      ],
    );
    return toAttempt(rows[0]);
  }

  async listAttempts(jobId: string): Promise<FetchAttemptRecord[]> {
    const { rows } = await this.pool.query<AttemptRow>(
      "SELECT * FROM fetch_attempts WHERE job_id = $1 ORDER BY attempt_number",
      [jobId],
    );
    return rows.map(toAttempt);
  }

  async saveValidatedContent(content: ValidatedContent): Promise<ValidatedContent> {
    const { rows } = await this.pool.query<ContentRow>(
      `INSERT INTO validated_contents
       (job_id, task_id, text, provenance, confidence, contradiction, decision, rejection_reason, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
       ON CONFLICT (job_id) DO NOTHING
       RETURNING *`,
      [
        content.job_id,
        content.task_id,
        content.text,
        JSON.stringify(content.provenance),
        content.confidence,
        content.contradiction,
        content.decision,
        content.rejection_reason,
        content.created_at,
      ],
    );
    if (rows[0]) {
      return toContent(rows[0]);
    }
    const stored = await this.getValidatedContent(content.job_id);
    if (!stored) {
      throw new Error(`Validated content for ${content.job_id} vanished during insert`);
    }
    return stored;
  }

  async getValidatedContent(jobId: string): Promise<ValidatedContent | null> {
    const { rows } = await this.pool.query<ContentRow>("SELECT * FROM validated_contents WHERE job_id = $1", [jobId]);
    return rows[0] ? toContent(rows[0]) : null;
  }

  async listAcceptedContents(taskId: string): Promise<ValidatedContent[]> {
    const { rows } = await this.pool.query<ContentRow>(
      `SELECT * FROM validated_contents
       WHERE task_id = $1 AND decision = 'accepted'
       ORDER BY created_at`,
      [taskId],
    );
    return rows.map(toContent);
  }
}

export class PostgresDeliveryRepository implements DeliveryRepository {
  constructor(private readonly pool: Pool) {}

  async claim(input: ClaimInput): Promise<ClaimResult> {
    const { rows } = await this.pool.query<DeliveryRow>(
      `INSERT INTO delivery_records (job_id, status, owner_id, lease_token, lease_expires_at, created_at, updated_at)
       VALUES ($1, 'pending', $2, $3, $4, $5, $5)
       ON CONFLICT (job_id) DO UPDATE
         SET status = 'pending', owner_id = EXCLUDED.owner_id, lease_token = EXCLUDED.lease_token,
             lease_expires_at = EXCLUDED.lease_expires_at, updated_at = EXCLUDED.updated_at
       WHERE delivery_records.status = 'failed'
          OR (delivery_records.status = 'pending' AND delivery_records.lease_expires_at <= EXCLUDED.updated_at)
       RETURNING *`,
      [input.jobId, input.ownerId, input.leaseToken, input.leaseExpiresAt, input.now],
    );
    if (rows[0]) {
      return { outcome: "claimed", record: toDelivery(rows[0]) };
    }
    const current = await this.get(input.jobId);
    if (!current) {
      throw new Error(`Delivery record ${input.jobId} vanished during claim`);
    }
    return current.status === "delivered"
      ? { outcome: "delivered", record: current }
      : { outcome: "held", record: current };
  }

  async releaseLeases(ownerId: string, now: string): Promise<number> {
    const { rowCount } = await this.pool.query(
      `UPDATE delivery_records SET lease_expires_at = $2, updated_at = $2
        WHERE owner_id = $1 AND status = 'pending' AND lease_expires_at > $2`,
      [ownerId, now],
    );
    return rowCount ?? 0;
  }

  async recordFailure(jobId: string, leaseToken: string, error: string): Promise<DeliveryRecord> {
    return this.update(
      jobId,
      leaseToken,
      "SET attempts = attempts + 1, last_error = $3, updated_at = now()",
      [error],
    );
  }

  async markDelivered(jobId: string, leaseToken: string, citationId: string): Promise<DeliveryRecord> {
    return this.update(
      jobId,
      leaseToken,
      "SET status = 'delivered', attempts = attempts + 1, citation_id = $3, last_error = NULL, updated_at = now()",
      [citationId],
    );
  }

  async markFailed(jobId: string, leaseToken: string, error: string): Promise<DeliveryRecord> {
    return this.update(jobId, leaseToken, "SET status = 'failed', last_error = $3, updated_at = now()", [error]);
  }

  async get(jobId: string): Promise<DeliveryRecord | null> {
    const { rows } = await this.pool.query<DeliveryRow>("SELECT * FROM delivery_records WHERE job_id = $1", [jobId]);
    return rows[0] ? toDelivery(rows[0]) : null;
  }

  private async update(jobId: string, leaseToken: string, setClause: string, params: unknown[]) {
    const { rows } = await this.pool.query<DeliveryRow>(
      `UPDATE delivery_records ${setClause} WHERE job_id = $1 AND lease_token = $2 RETURNING *`,
      [jobId, leaseToken, ...params],
    );
    if (!rows[0]) {
      throw new Error(`Delivery record ${jobId} is not held by lease ${leaseToken}`);
    }
    return toDelivery(rows[0]);
  }
}

export class PostgresCitationLedgerRepository implements CitationLedgerRepository {
  constructor(private readonly pool: Pool) {}

  async ensureEntry(input: LedgerEntryInput) {
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      // Serializes numbering per task.
      await client.query("SELECT pg_advisory_xact_lock(hashtext($1))", [input.taskId]);
      const existing = await client.query<LedgerRow>(
        "SELECT * FROM citation_ledger WHERE task_id = $1 AND source_hash = $2",
        [input.taskId, input.sourceHash],
      );
      if (existing.rows[0]) {
        await client.query("COMMIT");
        return { record: toLedger(existing.rows[0]), created: false };
      }
      const { rows } = await client.query<LedgerRow>(
        `INSERT INTO citation_ledger (task_id, job_id, source_hash, citation_number, title, url, accessed_at)
         SELECT $1, $2, $3, COALESCE(MAX(citation_number), 0) + 1, $4, $5, $6
           FROM citation_ledger WHERE task_id = $1
         RETURNING *`,
        [input.taskId, input.jobId, input.sourceHash, input.title, input.url, input.accessedAt],
      );
      await client.query("COMMIT");
      return { record: toLedger(rows[0]), created: true };
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }
  }

  async listForTask(taskId: string): Promise<CitationLedgerRecord[]> {
    const { rows } = await this.pool.query<LedgerRow>(
      "SELECT * FROM citation_ledger WHERE task_id = $1 ORDER BY citation_number",
      [taskId],
    );
    return rows.map(toLedger);
  }
}

export function createPostgresRepositories(pool: Pool): Repositories {
  return {
    research: new PostgresResearchRepository(pool),
    deliveries: new PostgresDeliveryRepository(pool),
    ledger: new PostgresCitationLedgerRepository(pool),
  };
}
