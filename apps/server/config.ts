import fs from "fs";
import { serverEnvSchema, customAirportsSchema, type CustomAirports } from "@shared/schema";

export interface ServerConfig {
  port: number;
  clientOrigin: string;
  crossCountryThresholdNm: number;
  pilotName: string;
  customAirports: CustomAirports;
  databaseUrl: string | null;
}

export const DEFAULT_SERVER_CONFIG: ServerConfig = {
  port: 3000,
  clientOrigin: "http://localhost:5000",
  crossCountryThresholdNm: 27,
  pilotName: "",
  customAirports: {},
  databaseUrl: null,
};

export class ConfigError extends Error {
  constructor(message: string, readonly details: string[] = []) {
    super(message);
    this.name = "ConfigError";
  }
}

function readCustomAirports(filePath: string): CustomAirports {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read custom airports file ${filePath}: ${reason}`);
  }

  const parsed = customAirportsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid custom airports file ${filePath}`,
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }
  return parsed.data;
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = serverEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      "Invalid server environment",
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const { PORT, CLIENT_ORIGIN, XC_THRESHOLD_NM, PILOT_NAME, CUSTOM_AIRPORTS_FILE, DATABASE_URL } = parsed.data;
  const customAirports = CUSTOM_AIRPORTS_FILE ? readCustomAirports(CUSTOM_AIRPORTS_FILE) : {};

  console.log(
    `[Config] port=${PORT} xc_threshold=${XC_THRESHOLD_NM}nm custom_airports=${Object.keys(customAirports).length}`
  );

  return {
    port: PORT,
    clientOrigin: CLIENT_ORIGIN,
    crossCountryThresholdNm: XC_THRESHOLD_NM,
    pilotName: PILOT_NAME,
    customAirports,
    databaseUrl: DATABASE_URL ?? null,
  };
}
