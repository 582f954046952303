import express, { type NextFunction, type Request, type Response } from "express";
import { createServer, type Server } from "http";
import { registerRoutes, type RouteDeps } from "./routes";

export async function createApp(deps: RouteDeps): Promise<{ app: express.Express; httpServer: Server }> {
  const logger = deps.logger ?? console;
  const app = express();
  const httpServer = createServer(app);

  // Batch exports post whole result sets back.
  app.use(express.json({ limit: "10mb" }));

  await registerRoutes(httpServer, app, deps);

  app.use("/api", (_req: Request, res: Response) => {
    res.status(404).json({ error: true, message: "Endpoint not found" });
  });

  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    logger.error(`[server] Unhandled error: ${err.message}`);
    res.status(500).json({ error: true, message: "Internal server error" });
  });

  return { app, httpServer };
}
