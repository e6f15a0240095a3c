// =============================================================================
// @reinforce-lab/server — Express app factory + stateless MCP transport
// =============================================================================
// Creates an Express application with a health check, CORS, per-client rate
// limiting, the /api/rl simulation routes, and a stateless MCP Streamable
// HTTP endpoint. Nothing is shared between requests except configuration
// and the logger.
// =============================================================================

import { createServer, type Server as HttpServer } from "node:http";
import express, {
  type Express,
  type Request,
  type Response,
  type RequestHandler,
  type ErrorRequestHandler,
  type NextFunction,
} from "express";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import {
  type ServerConfig,
  type Logger,
  loadServerConfig,
  createLogger,
} from "@reinforce-lab/shared";
import { createRateLimiter } from "./rate-limit.js";
import { createSimulationRouter } from "./simulate-api.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Callback that registers MCP tools on a per-request McpServer instance.
 */
export type ToolRegistrar = (server: McpServer, deps: AppDependencies) => void;

/**
 * Shared dependencies that route and tool implementations need.
 */
export interface AppDependencies {
  logger: Logger;
  config: ServerConfig;
}

/**
 * Return value of createApp — gives callers access to the HTTP server,
 * Express app, dependencies, and a shutdown function.
 */
export interface AppInstance {
  app: Express;
  httpServer: HttpServer;
  deps: AppDependencies;
  /** Register a tool registrar that will be called for every MCP request. */
  addToolRegistrar: (registrar: ToolRegistrar) => void;
  /** Graceful shutdown: stop the rate limiter and close the HTTP server. */
  shutdown: () => Promise<void>;
}

// ---------------------------------------------------------------------------
// CORS middleware (inline — no external dependency)
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
// Body errors (malformed JSON from express.json())
// ---------------------------------------------------------------------------

function createBodyErrorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    const status =
      typeof err === "object" &&
      err !== null &&
      "status" in err &&
      typeof err.status === "number"
        ? err.status
        : 500;

    logger.warn("Request rejected", {
      status,
      error: err instanceof Error ? err.message : String(err),
    });
    res.status(status).json({
      error: status === 400 ? "Malformed JSON body" : "Request failed",
    });
  };
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createApp(
  env?: Record<string, string | undefined>,
): AppInstance {
  // --- Configuration & dependencies ---
  const config = loadServerConfig(env);
  const logger = createLogger({
    level: config.LOG_LEVEL,
    bindings: { component: "server" },
  });

  const deps: AppDependencies = { logger, config };

  const toolRegistrars: ToolRegistrar[] = [];

  // --- Express app ---
  const app = express();
  app.use(express.json());
  app.use(createCorsMiddleware(config.CORS_ORIGINS));

  // --- Health endpoint (not rate limited) ---
  app.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "ok", uptime: process.uptime() });
  });

  const rateLimiter = createRateLimiter(config.RATE_LIMIT_PER_MIN);

  // --- Simulation REST API ---
  app.use("/api/rl", rateLimiter, createSimulationRouter(deps));

  // --- MCP Streamable HTTP transport (stateless, per-request) ---
  app.post("/mcp", rateLimiter, async (req: Request, res: Response) => {
    try {
      const server = new McpServer({
        name: "reinforce-lab",
        version: "0.1.0",
      });

      for (const registrar of toolRegistrars) {
        registrar(server, deps);
      }

      const transport = new StreamableHTTPServerTransport({
        sessionIdGenerator: undefined, // stateless
      });

      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (err) {
      logger.error("MCP request failed", {
        error: err instanceof Error ? err.message : String(err),
      });
      if (!res.headersSent) {
        res.status(500).json({ error: "Internal server error" });
      }
    }
  });

  // Reject GET and DELETE for stateless server
  app.get("/mcp", (_req: Request, res: Response) => {
    res.status(405).json({ error: "Method not allowed for stateless server" });
  });

  app.delete("/mcp", (_req: Request, res: Response) => {
    res.status(405).json({ error: "Method not allowed for stateless server" });
  });

  app.use(createBodyErrorHandler(logger));

  // --- HTTP server ---
  const httpServer = createServer(app);

  // --- Graceful shutdown ---
  let shuttingDown = false;

  async function shutdown(): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;

    logger.info("Shutting down gracefully...");

    rateLimiter.shutdown();

    // Close HTTP server (stop accepting new connections)
    if (httpServer.listening) {
      await new Promise<void>((resolve, reject) => {
        httpServer.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      });
    }

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
