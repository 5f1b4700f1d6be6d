import type { Express, NextFunction, Request, Response } from "express";
import type { AppConfig } from "./config";
import { errorMessage } from "./errors";
import { logger } from "./logger";
import { createPipelineRouter, type PipelineServices } from "./pipeline-api";
import { PipelineOrchestrator } from "./pipeline/orchestrator";
import { ProgressChannel } from "./pipeline/progress-channel";
import { RunGuard } from "./pipeline/run-guard";
import { CommandLineToolkit, type NeuroToolkit } from "./pipeline/toolkit";
import { UploadManager } from "./upload-manager";

/** Wires the process-wide run state. `toolkit` is swapped out in tests. */
export function createServices(config: AppConfig, toolkit?: NeuroToolkit): PipelineServices {
  const guard = new RunGuard();
  const channel = new ProgressChannel();
  const orchestrator = new PipelineOrchestrator({
    guard,
    channel,
    toolkit: toolkit ?? new CommandLineToolkit(config.tools, config.concurrency),
    profile: config.profile,
    concurrency: config.concurrency,
  });
  return {
    config,
    guard,
    channel,
    orchestrator,
    uploads: new UploadManager(config.uploadDir),
  };
}

export function registerRoutes(app: Express, services: PipelineServices): void {
  app.get("/", (_req, res) => {
    res.send("Home");
  });

  app.use("/api", createPipelineRouter(services));

  app.use("/api", (_req: Request, res: Response) => {
    res.status(404).json({ error: "Not found" });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logger.error(`Unhandled request error: ${errorMessage(err)}`, "routes");
    if (res.headersSent) return;
    res.status(500).json({ error: "Internal server error" });
  });
}
