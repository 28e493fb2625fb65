import type { Express, Response } from "express";
import { createServer, type Server } from "http";
import { MemStorage, type IStorage, type ConversionJob } from "./storage";
import { DEFAULT_SERVER_CONFIG, type ServerConfig } from "./config";
import {
  logbookRequestSchema,
  columnsRequestSchema,
  pipelineConfigSchema,
  type LogbookRequest,
} from "@shared/schema";
import {
  MappingError,
  buildClassifiedFlightsCsv,
  buildFormCells,
  parseExplicitMapping,
  readDelimitedLogbook,
  readLogbookFile,
  resolveAircraftProfile,
  resolveColumns,
  runLogbookPipeline,
  summarizeForm,
  type ExplicitColumnMapping,
  type LogbookSource,
  type MappingIssue,
  type PipelineResult,
} from "@caai/utils";

export interface RouteDependencies {
  storage?: IStorage;
  config?: ServerConfig;
}

interface LoadedSource {
  source: LogbookSource;
  dropped_rows: number;
}

function loadSource(body: LogbookRequest): LoadedSource {
  if (body.csv !== undefined) {
    const read = body.file_name
      ? readLogbookFile(body.file_name, body.csv)
      : readDelimitedLogbook(body.csv, body.delimiter);
    return {
      source: { headers: read.headers, rows: read.rows, row_numbers: read.row_numbers },
      dropped_rows: read.dropped_rows,
    };
  }
  return { source: { headers: body.headers ?? [], rows: body.rows ?? [] }, dropped_rows: 0 };
}

function csvFileName(job: Pick<ConversionJob, "file_name"> | null): string {
  const base = job?.file_name ? job.file_name.replace(/\.[^.]+$/, "") : "logbook";
  return `${base}_classified.csv`;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export async function registerRoutes(app: Express, deps: RouteDependencies = {}): Promise<Server> {
  const storage = deps.storage ?? new MemStorage();
  const config = deps.config ?? DEFAULT_SERVER_CONFIG;

  /**
   * Reads, maps and converts a logbook request. Sends the 4xx response itself
   * and returns null when the request cannot be converted.
   */
  function convert(
    body: unknown,
    res: Response
  ): { result: PipelineResult; request: LogbookRequest; dropped_rows: number } | null {
    const parsed = logbookRequestSchema.safeParse(body);
    if (!parsed.success) {
      res.status(400).json({ error: "Invalid input", details: parsed.error.issues });
      return null;
    }
    const request = parsed.data;

    let loaded: LoadedSource;
    try {
      loaded = loadSource(request);
    } catch (error) {
      res.status(400).json({ error: "Invalid logbook file", message: errorMessage(error) });
      return null;
    }

    let mappingIssues: MappingIssue[] = [];
    let explicitMapping: ExplicitColumnMapping | undefined;
    if (request.mapping) {
      const explicit = parseExplicitMapping(request.mapping);
      explicitMapping = explicit.mapping;
      mappingIssues = explicit.issues;
    }

    // Request values override the server defaults
    const settings = pipelineConfigSchema.safeParse({
      pilot_name: request.pilot_name ?? config.pilotName,
      explicit_mapping: request.mapping,
      cross_country_threshold_nm: request.cross_country_threshold_nm ?? config.crossCountryThresholdNm,
      custom_airports: config.customAirports,
    });
    if (!settings.success) {
      console.error("[Logbook] Invalid pipeline configuration:", settings.error.issues);
      res.status(500).json({ error: "Invalid pipeline configuration", details: settings.error.issues });
      return null;
    }

    try {
      const result = runLogbookPipeline(loaded.source, {
        pilot_name: settings.data.pilot_name,
        explicit_mapping: explicitMapping,
        cross_country_threshold_nm: settings.data.cross_country_threshold_nm,
        custom_airports: settings.data.custom_airports,
        mapping_issues: mappingIssues,
      });
      return { result, request, dropped_rows: loaded.dropped_rows };
    } catch (error) {
      if (error instanceof MappingError) {
        res.status(422).json({
          error: "Column mapping failed",
          message: error.message,
          resolution: error.resolution,
        });
        return null;
      }
      throw error;
    }
  }

  app.get("/api/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  // ============================================================================
  // LOGBOOK CONVERSION API
  // ============================================================================

  app.post("/api/logbook/columns", (req, res) => {
    const parsed = columnsRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: "Invalid input", details: parsed.error.issues });
    }

    const explicit = parsed.data.mapping ? parseExplicitMapping(parsed.data.mapping) : null;
    const resolution = resolveColumns(parsed.data.headers, explicit?.mapping);
    res.json({
      ...resolution,
      issues: [...(explicit?.issues ?? []), ...resolution.issues],
    });
  });

  app.post("/api/logbook/analyze", async (req, res) => {
    try {
      const converted = convert(req.body, res);
      if (!converted) return;
      const { result, request, dropped_rows } = converted;

      const job = await storage.createConversionJob({
        file_name: request.file_name ?? null,
        result,
        form_cells: buildFormCells(result.form, result.pilot_name),
        summary: summarizeForm(result.form),
      });

      res.locals.jobId = job.id;
      console.log(
        `[Logbook] job ${job.id}: ${result.flights.length}/${result.rows_read} rows classified, ` +
        `${result.normalization_errors.length} row errors, overall ${result.form.totals.overall_total} hrs`
      );

      res.status(201).json({
        job_id: job.id,
        status: job.status,
        dropped_rows,
        result,
        summary: job.summary.lines,
      });
    } catch (error) {
      console.error("[Logbook] Conversion failed:", error);
      res.status(500).json({ error: "Failed to convert logbook", message: errorMessage(error) });
    }
  });

  app.post("/api/logbook/form-cells", (req, res) => {
    try {
      const converted = convert(req.body, res);
      if (!converted) return;
      const { result } = converted;
      res.json(buildFormCells(result.form, result.pilot_name));
    } catch (error) {
      console.error("[Logbook] Form cell build failed:", error);
      res.status(500).json({ error: "Failed to build form cells", message: errorMessage(error) });
    }
  });

  app.post("/api/logbook/flights.csv", (req, res) => {
    try {
      const converted = convert(req.body, res);
      if (!converted) return;
      const name = csvFileName({ file_name: converted.request.file_name ?? null });
      res
        .type("text/csv")
        .attachment(name)
        .send(buildClassifiedFlightsCsv(converted.result.flights));
    } catch (error) {
      console.error("[Logbook] CSV export failed:", error);
      res.status(500).json({ error: "Failed to export flights", message: errorMessage(error) });
    }
  });

  // ============================================================================
  // CONVERSION JOBS API
  // ============================================================================

  app.get("/api/jobs", async (_req, res) => {
    try {
      res.json(await storage.listConversionJobs());
    } catch (error) {
      res.status(500).json({ error: "Failed to fetch jobs" });
    }
  });

  app.get("/api/jobs/:id", async (req, res) => {
    try {
      res.locals.jobId = req.params.id;
      const job = await storage.getConversionJob(req.params.id);
      if (!job) {
        return res.status(404).json({ error: "Job not found" });
      }
      res.json(job);
    } catch (error) {
      res.status(500).json({ error: "Failed to fetch job" });
    }
  });

  app.get("/api/jobs/:id/form-cells", async (req, res) => {
    try {
      res.locals.jobId = req.params.id;
      const job = await storage.getConversionJob(req.params.id);
      if (!job) {
        return res.status(404).json({ error: "Job not found" });
      }
      res.json(job.form_cells);
    } catch (error) {
      res.status(500).json({ error: "Failed to fetch form cells" });
    }
  });

  app.get("/api/jobs/:id/flights.csv", async (req, res) => {
    try {
      res.locals.jobId = req.params.id;
      const job = await storage.getConversionJob(req.params.id);
      if (!job) {
        return res.status(404).json({ error: "Job not found" });
      }
      res
        .type("text/csv")
        .attachment(csvFileName(job))
        .send(buildClassifiedFlightsCsv(job.result.flights));
    } catch (error) {
      res.status(500).json({ error: "Failed to export flights" });
    }
  });

  app.delete("/api/jobs/:id", async (req, res) => {
    try {
      res.locals.jobId = req.params.id;
      const deleted = await storage.deleteConversionJob(req.params.id);
      if (!deleted) {
        return res.status(404).json({ error: "Job not found" });
      }
      res.status(204).send();
    } catch (error) {
      res.status(500).json({ error: "Failed to delete job" });
    }
  });

  // ============================================================================
  // AIRCRAFT API
  // ============================================================================

  app.get("/api/aircraft/:type", (req, res) => {
    const profile = resolveAircraftProfile(req.params.type);
    if (profile.group === "UNRESOLVED") {
      return res.status(404).json({ error: "Aircraft type not found", profile });
    }
    res.json(profile);
  });

  const httpServer = createServer(app);
  return httpServer;
}
