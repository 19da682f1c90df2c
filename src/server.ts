import "dotenv/config";
import { Hono } from "hono";
import { serve } from "@hono/node-server";
import { createServer } from "node:net";
import { createApi } from "./routes.js";
import config from "./config/env.js";

type NodeServer = ReturnType<typeof serve>;

function isAddressInUse(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "EADDRINUSE";
}

/**
 * Study aid server bootstrap
 */
class StudyAidServer {
  private app: Hono;
  private server: NodeServer | null = null;

  constructor() {
    this.app = new Hono();
    this.setupRoutes();
    this.setupGracefulShutdown();
  }

  /**
   * Setup application routes and error handlers
   */
  private setupRoutes(): void {
    this.app.route("/api", createApi());

    this.app.notFound((c) => {
      if (c.req.url.includes("/api/")) {
        return c.json({ error: "Endpoint not found" }, 404);
      }
      return c.text("Not Found", 404);
    });

    this.app.onError((error, c) => {
      console.error("Unhandled error:", error);
      return c.json(
        {
          error: "Internal server error",
          message: config.isDevelopment ? error.message : undefined,
        },
        500
      );
    });
  }

  /**
   * Find an available port starting from the base port
   */
  private async findAvailablePort(
    startPort: number,
    maxAttempts = 10
  ): Promise<number> {
    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      const port = startPort + attempt;

      try {
        await new Promise<void>((resolve, reject) => {
          const tester = createServer()
            .once("error", reject)
            .once("listening", () => {
              tester.close(() => resolve());
            })
            .listen(port);
        });

        return port;
      } catch (error) {
        if (!isAddressInUse(error)) {
          throw error;
        }
        // Port is in use, try next one
      }
    }

    throw new Error(
      `Could not find available port after ${maxAttempts} attempts starting from ${startPort}`
    );
  }

  /**
   * Setup graceful shutdown handlers
   */
  private setupGracefulShutdown(): void {
    const shutdown = (signal: string) => {
      console.log(`\n[STUDYAID] Received ${signal}, shutting down gracefully...`);

      if (!this.server) {
        process.exit(0);
      }

      this.server.close(() => {
        console.log("[STUDYAID] Server closed");
        process.exit(0);
      });

      // Force exit after 10 seconds
      setTimeout(() => {
        console.log("[STUDYAID] Force exit after timeout");
        process.exit(1);
      }, 10000).unref();
    };

    process.on("SIGINT", () => shutdown("SIGINT"));
    process.on("SIGTERM", () => shutdown("SIGTERM"));

    process.on("uncaughtException", (error) => {
      console.error("[STUDYAID] Uncaught exception:", error);
      shutdown("UNCAUGHT_EXCEPTION");
    });

    process.on("unhandledRejection", (reason) => {
      console.error("[STUDYAID] Unhandled rejection:", reason);
      if (config.isDevelopment) {
        shutdown("UNHANDLED_REJECTION");
      }
    });
  }

  /**
   * Start the server
   */
  async start(): Promise<void> {
    if (config.isProduction && !config.groqApiKey) {
      console.warn(
        "[STUDYAID] Warning: GROQ_API_KEY not set in production environment"
      );
    }

    const port = await this.findAvailablePort(config.port);
    if (port !== config.port) {
      console.log(
        `[STUDYAID] Port ${config.port} unavailable, using ${port} instead`
      );
    }

    const hostname = config.isDevelopment ? config.host : "0.0.0.0";

    console.log(`[STUDYAID] Starting server...`);
    console.log(`[STUDYAID] Environment: ${process.env.NODE_ENV || "development"}`);
    console.log(`[STUDYAID] Model: ${config.groqModel}`);
    console.log(
      `[STUDYAID] Document limit: ${config.documentCharLimit} characters`
    );

    this.server = serve({ fetch: this.app.fetch, port, hostname });

    console.log(`[STUDYAID] Server running on http://${hostname}:${port}`);
    console.log(`[STUDYAID] Health check: http://localhost:${port}/api/health`);
  }
}

const server = new StudyAidServer();
server.start().catch((error) => {
  console.error("[STUDYAID] Server startup failed:", error);
  process.exit(1);
});
