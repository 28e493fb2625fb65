import { pgTable, text, integer, doublePrecision, timestamp, jsonb } from "drizzle-orm/pg-core";
import { z } from "zod";
import type { PipelineResult, FormCellsResult, FormSummary } from "@caai/utils";

// Explicit column mapping: field name (any spelling) -> header name or 0-based index
export const explicitMappingSchema = z.record(
  z.string().min(1),
  z.union([z.string().min(1), z.number().int().nonnegative()])
);

// Pilot's own airports: { "ICAO": [lat, lon] }
export const customAirportsSchema = z.record(
  z.string().min(1),
  z.tuple([z.number().min(-90).max(90), z.number().min(-180).max(180)])
);

export type CustomAirports = z.infer<typeof customAirportsSchema>;

export const pipelineConfigSchema = z.object({
  pilot_name: z.string().default(""),
  explicit_mapping: explicitMappingSchema.optional(),
  cross_country_threshold_nm: z.number().positive().default(27),
  custom_airports: customAirportsSchema.optional(),
});

// Cells may arrive as JSON numbers or nulls from spreadsheet tooling
const rawCellSchema = z
  .union([z.string(), z.number(), z.null()])
  .transform((value) => (value === null ? "" : String(value)));

export const logbookRequestSchema = z
  .object({
    csv: z.string().optional(),
    file_name: z.string().min(1).optional(),
    delimiter: z.string().length(1).optional(),
    headers: z.array(z.string()).min(1).optional(),
    rows: z.array(z.array(rawCellSchema)).optional(),
    mapping: explicitMappingSchema.optional(),
    pilot_name: z.string().optional(),
    cross_country_threshold_nm: z.number().positive().optional(),
  })
  .refine(
    (body) => body.csv !== undefined || (body.headers !== undefined && body.rows !== undefined),
    { message: "Provide csv text, or headers together with rows" }
  );

export type LogbookRequest = z.infer<typeof logbookRequestSchema>;

export const columnsRequestSchema = z.object({
  headers: z.array(z.string()).min(1),
  mapping: explicitMappingSchema.optional(),
});

export const serverEnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  CLIENT_ORIGIN: z.string().min(1).default("http://localhost:5000"),
  XC_THRESHOLD_NM: z.coerce.number().positive().default(27),
  PILOT_NAME: z.string().default(""),
  CUSTOM_AIRPORTS_FILE: z.string().min(1).optional(),
  DATABASE_URL: z.string().min(1).optional(),
});

// Conversion jobs kept by the server so results can be fetched again
export const conversionJobStatusEnum = ["complete", "partial"] as const;
export type ConversionJobStatus = typeof conversionJobStatusEnum[number];

export const conversionJobs = pgTable("conversion_jobs", {
  id: text("id").primaryKey(),
  created_at: timestamp("created_at").defaultNow().notNull(),
  file_name: text("file_name"),
  status: text("status", { enum: conversionJobStatusEnum }).notNull(),
  pilot_name: text("pilot_name").notNull(),
  flight_count: integer("flight_count").notNull(),
  overall_total: doublePrecision("overall_total").notNull(),
  result_data: jsonb("result_data").$type<PipelineResult>().notNull(),
  form_cells_data: jsonb("form_cells_data").$type<FormCellsResult>().notNull(),
  summary_data: jsonb("summary_data").$type<FormSummary>().notNull(),
});

export type ConversionJobRow = typeof conversionJobs.$inferSelect;
