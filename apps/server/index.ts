import express, { type Request, Response, NextFunction } from "express";
import cors from "cors";
import { registerRoutes } from "./routes";
import { loadServerConfig } from "./config";
import { createStorage } from "./storage";

const config = loadServerConfig();
const storage = createStorage(config.databaseUrl);
const app = express();

app.use(cors({
  origin: config.clientOrigin,
  credentials: true,
}));

// Logbook exports arrive inline as CSV text
app.use(express.json({ limit: "10mb" }));
app.use(express.urlencoded({ extended: false }));

function log(message: string) {
  console.log(`${new Date().toISOString()} [server] ${message}`);
}

// One line per /api request; routes that touch a conversion job leave its id in res.locals.jobId
app.use((req, res, next) => {
  const start = Date.now();

  res.on("finish", () => {
    if (!req.path.startsWith("/api")) return;
    const jobId: unknown = res.locals.jobId;
    const job = typeof jobId === "string" ? ` job=${jobId}` : "";
    log(`${req.method} ${req.path} ${res.statusCode} in ${Date.now() - start}ms${job}`);
  });

  next();
});

(async () => {
  const server = await registerRoutes(app, { storage, config });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = typeof err === "object" && err !== null && "status" in err && typeof err.status === "number"
      ? err.status
      : 500;
    const message = err instanceof Error ? err.message : "Internal Server Error";

    console.error("[server] Unhandled error:", err);
    res.status(status).json({ message });
  });

  server.listen({
    port: config.port,
    host: "0.0.0.0",
  }, () => {
    log(`API server running on port ${config.port}`);
    log(`Accepting requests from ${config.clientOrigin}`);
  });
})().catch((error) => {
  console.error("[server] Failed to start:", error);
  process.exit(1);
});
