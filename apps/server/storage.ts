import crypto from "crypto";
import { eq, desc } from "drizzle-orm";
import { conversionJobs, type ConversionJobRow, type ConversionJobStatus } from "@shared/schema";
import type { PipelineResult, FormCellsResult, FormSummary } from "@caai/utils";
import { createDatabase, type Database } from "./db";

export interface ConversionJob {
  id: string;
  created_at: Date;
  file_name: string | null;
  status: ConversionJobStatus;
  result: PipelineResult;
  form_cells: FormCellsResult;
  summary: FormSummary;
}

export type InsertConversionJob = Omit<ConversionJob, "id" | "created_at" | "status">;

export interface ConversionJobListing {
  id: string;
  created_at: Date;
  file_name: string | null;
  status: ConversionJobStatus;
  pilot_name: string;
  flights: number;
  overall_total: number;
}

export interface IStorage {
  createConversionJob(job: InsertConversionJob): Promise<ConversionJob>;
  getConversionJob(id: string): Promise<ConversionJob | undefined>;
  listConversionJobs(): Promise<ConversionJobListing[]>;
  deleteConversionJob(id: string): Promise<boolean>;
}

// Oldest jobs are evicted beyond this many
const MAX_JOBS = 100;

function newJobId(): string {
  return crypto.randomUUID();
}

function jobStatus(job: InsertConversionJob): ConversionJobStatus {
  return job.result.normalization_errors.length > 0 ? "partial" : "complete";
}

export class MemStorage implements IStorage {
  private jobs = new Map<string, ConversionJob>();

  async createConversionJob(job: InsertConversionJob): Promise<ConversionJob> {
    const id = newJobId();
    const created: ConversionJob = {
      ...job,
      id,
      created_at: new Date(),
      status: jobStatus(job),
    };
    this.jobs.set(id, created);

    while (this.jobs.size > MAX_JOBS) {
      const oldest = this.jobs.keys().next();
      if (oldest.done) break;
      this.jobs.delete(oldest.value);
    }
    return created;
  }

  async getConversionJob(id: string): Promise<ConversionJob | undefined> {
    return this.jobs.get(id);
  }

  async listConversionJobs(): Promise<ConversionJobListing[]> {
    return [...this.jobs.values()]
      .sort((a, b) => b.created_at.getTime() - a.created_at.getTime())
      .map((job) => ({
        id: job.id,
        created_at: job.created_at,
        file_name: job.file_name,
        status: job.status,
        pilot_name: job.result.pilot_name,
        flights: job.result.flights.length,
        overall_total: job.result.form.totals.overall_total,
      }));
  }

  async deleteConversionJob(id: string): Promise<boolean> {
    return this.jobs.delete(id);
  }
}

function toConversionJob(row: ConversionJobRow): ConversionJob {
  return {
    id: row.id,
    created_at: row.created_at,
    file_name: row.file_name,
    status: row.status,
    result: row.result_data,
    form_cells: row.form_cells_data,
    summary: row.summary_data,
  };
}

export class DatabaseStorage implements IStorage {
  constructor(private readonly db: Database) {}

  async createConversionJob(job: InsertConversionJob): Promise<ConversionJob> {
    const [row] = await this.db.insert(conversionJobs).values({
      id: newJobId(),
      file_name: job.file_name,
      status: jobStatus(job),
      pilot_name: job.result.pilot_name,
      flight_count: job.result.flights.length,
      overall_total: job.result.form.totals.overall_total,
      result_data: job.result,
      form_cells_data: job.form_cells,
      summary_data: job.summary,
    }).returning();
    return toConversionJob(row);
  }

  async getConversionJob(id: string): Promise<ConversionJob | undefined> {
    const [row] = await this.db.select().from(conversionJobs).where(eq(conversionJobs.id, id));
    return row ? toConversionJob(row) : undefined;
  }

  async listConversionJobs(): Promise<ConversionJobListing[]> {
    return this.db
      .select({
        id: conversionJobs.id,
        created_at: conversionJobs.created_at,
        file_name: conversionJobs.file_name,
        status: conversionJobs.status,
        pilot_name: conversionJobs.pilot_name,
        flights: conversionJobs.flight_count,
        overall_total: conversionJobs.overall_total,
      })
      .from(conversionJobs)
      .orderBy(desc(conversionJobs.created_at));
  }

  async deleteConversionJob(id: string): Promise<boolean> {
    const deleted = await this.db
      .delete(conversionJobs)
      .where(eq(conversionJobs.id, id))
      .returning({ id: conversionJobs.id });
    return deleted.length > 0;
  }
}

// Jobs live in PostgreSQL when a database is configured, in memory otherwise
export function createStorage(databaseUrl: string | null): IStorage {
  if (databaseUrl) {
    console.log("[Storage] Conversion jobs stored in PostgreSQL");
    return new DatabaseStorage(createDatabase(databaseUrl));
  }
  console.log("[Storage] Conversion jobs kept in memory");
  return new MemStorage();
}
