import "dotenv/config";
import express from "express";
import { createServer } from "http";
import net from "net";
import { createExpressMiddleware } from "@trpc/server/adapters/express";
import { appRouter } from "../routers";
import { createServiceRegistry } from "../registry";
import { loadAppConfig } from "./config";
import { createContextFactory } from "./context";
import { errorMessage } from "./errors";
import { validateEnvironment } from "./envValidation";

function isPortAvailable(port: number): Promise<boolean> {
  return new Promise(resolve => {
    const server = net.createServer();
    server.listen(port, () => {
      server.close(() => resolve(true));
    });
    server.on("error", () => resolve(false));
  });
}

async function findAvailablePort(startPort: number = 3000): Promise<number> {
  for (let port = startPort; port < startPort + 20; port++) {
    if (await isPortAvailable(port)) {
      return port;
    }
  }
  throw new Error(`No available port found starting from ${startPort}`);
}

async function startServer() {
  // Validate environment variables before anything else
  const { errors: envErrors } = validateEnvironment();
  if (envErrors.length > 0) {
    console.error("\n[FATAL] Cannot start — fix the environment variables above.\n");
    process.exit(1);
  }

  const config = loadAppConfig();
  const services = await createServiceRegistry(config);

  try {
    await services.graphStore.verifyConnectivity();
    console.log("[Startup] Graph database reachable");
  } catch (err) {
    // Non-fatal: queries fail and heal until the database comes up
    console.warn(`[Startup] Graph database not reachable yet: ${errorMessage(err)}`);
  }

  const app = express();
  const server = createServer(app);
  app.use(express.json({ limit: "1mb" }));

  // Health check for Docker / load balancers
  app.get("/api/health", async (_req, res) => {
    let graph: "connected" | "unavailable" = "connected";
    let graphError: string | undefined;
    try {
      await services.graphStore.verifyConnectivity();
    } catch (err) {
      graph = "unavailable";
      graphError = errorMessage(err).substring(0, 200);
    }
    res.status(graph === "connected" ? 200 : 503).json({
      status: graph === "connected" ? "healthy" : "degraded",
      timestamp: new Date().toISOString(),
      graph,
      ...(graphError ? { graphError } : {}),
      sessionStore: services.sessionStore.mode,
    });
  });

  // tRPC API
  app.use(
    "/api/trpc",
    createExpressMiddleware({
      router: appRouter,
      createContext: createContextFactory(services),
    })
  );

  const preferredPort = config.port;
  const port = await findAvailablePort(preferredPort);

  if (port !== preferredPort) {
    console.log(`Port ${preferredPort} is busy, using port ${port} instead`);
  }

  server.listen(port, () => {
    console.log(`Server running on http://localhost:${port}/`);
  });

  const shutdown = (signal: string) => {
    console.log(`[Startup] ${signal} received, shutting down`);
    server.close(() => {
      services.graphStore.close().then(
        () => process.exit(0),
        (err: unknown) => {
          console.error(`[Startup] Graph driver close failed: ${errorMessage(err)}`);
          process.exit(1);
        }
      );
    });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

startServer().catch(console.error);
