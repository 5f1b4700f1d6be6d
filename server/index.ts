import "dotenv/config";
import express from "express";
import { createServer } from "http";
import net from "node:net";
import { loadConfig } from "./config";
import { errorMessage } from "./errors";
import { logger } from "./logger";
import { createServices, registerRoutes } from "./routes";

async function startServer() {
  const config = loadConfig();
  const app = express();
  const server = createServer(app);

  app.use(express.json({ limit: '1mb' }));

  const services = createServices(config);
  registerRoutes(app, services);

  const removed = await services.uploads.cleanupStaleSessions();
  if (removed > 0) {
    logger.info(`Removed ${removed} stale upload sessions`, 'server');
  }

  // Choose a free port: honor PORT if supplied; otherwise scan preferred list
  const preferredPorts = [5000, 5001, 5002, 8787];

  const findAvailablePort = async (candidates: number[]): Promise<number> => {
    const tryListen = (p: number) => new Promise<boolean>((resolve) => {
      const tester = net.createServer()
        .once('error', () => resolve(false))
        .once('listening', () => {
          tester.close(() => resolve(true));
        })
        .listen(p, '0.0.0.0');
    });
    if (config.port !== undefined) {
      const ok = await tryListen(config.port);
      if (ok) return config.port;
      logger.warn(`Port ${config.port} is taken; looking for another`, 'server');
    }
    for (const p of candidates) {
      const ok = await tryListen(p);
      if (ok) return p;
    }
    // Last resort: OS-assigned ephemeral
    return await new Promise<number>((resolve) => {
      const s = net.createServer()
        .once('listening', () => {
          const addr = s.address();
          const chosen = typeof addr === 'object' && addr ? addr.port : 0;
          s.close(() => resolve(chosen));
        })
        .listen(0, '0.0.0.0');
    });
  };

  const port = await findAvailablePort(preferredPorts);
  server.listen(port, "0.0.0.0", () => {
    logger.info(`Server running on port ${port} (data root ${config.dataRoot})`, 'server');
  });
}

startServer().catch((error: unknown) => {
  logger.error(`Server failed to start: ${errorMessage(error)}`, 'server');
  process.exitCode = 1;
});
