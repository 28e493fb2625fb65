import express from "express";
import cors from "cors";
import { MemStorage } from "../storage";
import { DEFAULT_SERVER_CONFIG, type ServerConfig } from "../config";

export async function createTestApp(config: ServerConfig = DEFAULT_SERVER_CONFIG) {
  const app = express();

  app.use(cors({
    origin: true,
    credentials: true,
  }));

  app.use(express.json({ limit: "10mb" }));
  app.use(express.urlencoded({ extended: false }));

  const { registerRoutes } = await import("../routes");
  await registerRoutes(app, { storage: new MemStorage(), config });

  return app;
}
