// =============================================================================
// @feedsieve/server: MCP server factory + Express app + Streamable HTTP transport
// =============================================================================
// Creates an Express application with a health check, authentication, rate
// limiting, and a stateless MCP Streamable HTTP endpoint. The factory wires
// storage and the update pipeline once; tool registrars receive them through
// AppDependencies on every MCP request.
// =============================================================================

import { createServer, type Server as HttpServer } from "node:http";
import express, {
  type Express,
  type Request,
  type Response,
  type RequestHandler,
} from "express";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import {
  type AdminStorage,
  type Config,
  type Driver,
  type HealthCheckResult,
  type Logger,
  Neo4jStore,
  closeDriver,
  createDriver,
  createLogger,
  errorMessage,
  healthCheck,
  loadConfig,
} from "@feedsieve/shared";
import {
  createPipeline,
  resolveHost,
  type FaviconResolver,
  type HostResolver,
  type Pipeline,
} from "@feedsieve/worker";
import { createAuthMiddleware, createRateLimiter } from "./auth.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Callback that registers MCP tools on a per-request McpServer instance.
 * Tool modules export functions matching this signature.
 */
export type ToolRegistrar = (server: McpServer, deps: AppDependencies) => void;

/**
 * Shared dependencies that tool implementations need.
 */
export interface AppDependencies {
  /** Null when the app runs on an injected store */
  driver: Driver | null;
  store: AdminStorage;
  pipeline: Pipeline;
  logger: Logger;
  config: Config;
}

/** Overrides for tests and local runs without Neo4j. */
export interface AppOptions {
  store?: AdminStorage;
  logger?: Logger;
  resolveHost?: HostResolver;
  favicons?: FaviconResolver;
}

/**
 * Return value of createApp: gives callers access to the HTTP server,
 * Express app, dependencies, and a shutdown function.
 */
export interface AppInstance {
  app: Express;
  httpServer: HttpServer;
  deps: AppDependencies;
  /** Register a tool registrar that will be called for every MCP request. */
  addToolRegistrar: (registrar: ToolRegistrar) => void;
  /** Graceful shutdown: close HTTP server, rate limiter and Neo4j. */
  shutdown: () => Promise<void>;
}

// ---------------------------------------------------------------------------
// CORS middleware
// ---------------------------------------------------------------------------

function createCorsMiddleware(origins: string): RequestHandler {
  return (req: Request, res: Response, next) => {
    res.setHeader("Access-Control-Allow-Origin", origins);
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, DELETE, OPTIONS");
    res.setHeader(
      "Access-Control-Allow-Headers",
      "Content-Type, Authorization",
    );

    if (req.method === "OPTIONS") {
      res.status(204).end();
      return;
    }

    next();
  };
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createApp(
  env?: Record<string, string | undefined>,
  options: AppOptions = {},
): AppInstance {
  // --- Configuration & dependencies ---
  const config = loadConfig(env);
  const logger = options.logger ?? createLogger({ level: config.LOG_LEVEL });
  let driver: Driver | null = null;
  let store: AdminStorage;
  if (options.store) {
    store = options.store;
  } else {
    driver = createDriver(config);
    store = new Neo4jStore(driver);
  }
  const pipeline = createPipeline({
    storage: store,
    logger,
    config,
    favicons: options.favicons,
    resolveHost: options.resolveHost ?? resolveHost,
  });

  const deps: AppDependencies = {
    driver,
    store,
    pipeline,
    logger,
    config,
  };

  const toolRegistrars: ToolRegistrar[] = [];

  // --- Express app ---
  const app = express();
  app.use(express.json());
  app.use(createCorsMiddleware(config.CORS_ORIGINS));

  // --- Health endpoint (unauthenticated) ---
  app.get("/health", async (_req: Request, res: Response) => {
    const storage: HealthCheckResult = driver
      ? await healthCheck(driver)
      : { ok: true, latencyMs: 0 };

    res.status(storage.ok ? 200 : 503).json({
      status: storage.ok ? "ok" : "unhealthy",
      storage,
      updateRunning: pipeline.updater.running,
      uptime: process.uptime(),
    });
  });

  // --- Auth + Rate limiter for MCP routes ---
  const authMiddleware = createAuthMiddleware(config.API_KEYS);
  const rateLimiter = createRateLimiter(config.RATE_LIMIT_PER_MIN);

  // --- MCP Streamable HTTP transport (stateless, per-request) ---
  app.post(
    "/mcp",
    authMiddleware,
    rateLimiter,
    async (req: Request, res: Response) => {
      try {
        const server = new McpServer({ name: "feedsieve", version: "0.1.0" });

        for (const registrar of toolRegistrars) {
          registrar(server, deps);
        }

        const transport = new StreamableHTTPServerTransport({
          sessionIdGenerator: undefined, // stateless
        });

        await server.connect(transport);
        await transport.handleRequest(req, res, req.body);
      } catch (err) {
        logger.error("MCP request failed", { error: errorMessage(err) });
        if (!res.headersSent) {
          res.status(500).json({ error: "Internal server error" });
        }
      }
    },
  );

  // Reject GET and DELETE for stateless server
  app.get("/mcp", (_req: Request, res: Response) => {
    res.status(405).json({ error: "Method not allowed for stateless server" });
  });

  app.delete("/mcp", (_req: Request, res: Response) => {
    res.status(405).json({ error: "Method not allowed for stateless server" });
  });

  // --- HTTP server ---
  const httpServer = createServer(app);

  // --- Graceful shutdown ---
  let shuttingDown = false;

  async function shutdown(): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;

    logger.info("Shutting down gracefully...");

    rateLimiter.shutdown();
    pipeline.updater.cancel();

    if (httpServer.listening) {
      await new Promise<void>((resolve, reject) => {
        httpServer.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      });
    }

    if (driver) await closeDriver(driver);

    logger.info("Shutdown complete");
  }

  return {
    app,
    httpServer,
    deps,
    addToolRegistrar: (registrar: ToolRegistrar) => {
      toolRegistrars.push(registrar);
    },
    shutdown,
  };
}
