/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * app.ts: Express application builder for NalVault.
 */
import type { CliOverrides, ConfigurationResult } from "./config/index.js";
import type { Express, NextFunction, Request, Response } from "express";
import { LOG, createMorganStream, formatError, getCurrentPattern, isAnyDebugEnabled, resolveFFmpegPath, setConsoleLogging,
  shouldSkipRequestLog } from "./utils/index.js";
import { displayConfiguration, getDataDir, getLogFilePath, initializeConfiguration, validateConfiguration } from "./config/index.js";
import { initializeFileLogger, shutdownFileLogger } from "./utils/fileLogger.js";
import type { Config } from "./types/index.js";
import { ConnectionLog } from "./ingest/connectionLog.js";
import { FileReplayReceiver } from "./ingest/replay.js";
import { RecordingSession } from "./recording/session.js";
import type { RouteContext } from "./routes/index.js";
import type { Server } from "node:http";
import { SlotRegistry } from "./ingest/registry.js";
import consoleStamp from "console-stamp";
import express from "express";
import fs from "node:fs/promises";
import morgan from "morgan";
import { setupRoutes } from "./routes/index.js";

/*
 * LOGGING MODE
 *
 * The logging mode is set at startup based on the --console CLI flag. When console logging is enabled, timestamps are added via console-stamp and output goes to
 * stdout/stderr. When file logging is used (the default), output goes to <data-dir>/nalvault.log.
 */

/**
 * A file to replay into a slot at startup.
 */
export interface ReplaySource {

  file: string;

  // 1-based slot index.
  slot: number;
}

/**
 * Startup options gathered from the command line.
 */
export interface ServerOptions extends CliOverrides {

  consoleLogging: boolean;

  // Start a recording session as soon as the server is up.
  record: boolean;

  replays: ReplaySource[];
}

/*
 * GRACEFUL SHUTDOWN
 *
 * On SIGINT or SIGTERM we stop accepting device data, let the recording session drain (every recorder finalizes its segment and a last consolidation pass runs),
 * stop the preview decoders and close the HTTP server before exiting.
 */

/**
 * Sets up signal handlers for graceful shutdown.
 * @param context - The running service.
 * @param replays - Active file replays.
 * @param server - The HTTP server.
 * @param usingConsoleLogging - Whether the file logger is in use.
 */
function setupGracefulShutdown(context: RouteContext, replays: readonly FileReplayReceiver[], server: Server, usingConsoleLogging: boolean): void {

  let shutdownInProgress = false;

  async function shutdown(): Promise<void> {

    // Prevent multiple shutdown attempts if multiple signals are received.
    if(shutdownInProgress) {

      return;
    }

    shutdownInProgress = true;

    LOG.info("Shutting down.");

    for(const replay of replays) {

      replay.stop();
    }

    // Recordings are finalized before anything else is torn down.
    try {

      await context.session.stop();
    } catch(error) {

      LOG.error("Error stopping the recording session during shutdown: %s.", formatError(error));
    }

    context.registry.stopDecoders();

    server.close((): void => {

      LOG.info("HTTP server closed successfully.");
    });

    if(!usingConsoleLogging) {

      shutdownFileLogger();
    }

    process.exit(0);
  }

  process.on("SIGINT", (): void => {

    void shutdown();
  });

  process.on("SIGTERM", (): void => {

    void shutdown();
  });
}

/*
 * APPLICATION BUILDER
 *
 * The buildApp function creates and configures the Express application with all middleware and routes. This is separated from the server startup so the service
 * objects are created once and handed to the routes.
 */

/**
 * Creates and configures the Express application with all middleware and routes.
 * @param context - The running service.
 * @returns The configured Express application.
 */
export function buildApp(context: RouteContext): Express {

  const app = express();
  const httpLogLevel = context.config.logging.httpLogLevel;

  app.use(express.json());

  // Morgan output goes through morganStream, which handles timestamp formatting consistently for both console and file logging modes.
  if(httpLogLevel !== "none") {

    app.use(morgan(":method :url from :remote-addr responded :status in :response-time ms.", {

      skip: (_req, res): boolean => shouldSkipRequestLog(httpLogLevel, res.statusCode),
      stream: createMorganStream()
    }));
  }

  setupRoutes(app, context);

  // Global error handler. Express error handlers require 4 parameters even if unused.
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction): void => {

    LOG.error("Unhandled error in request: %s.", formatError(err));

    if(!res.headersSent) {

      res.status(500).json({ error: "Internal server error." });
    }
  });

  return app;
}

/**
 * Starts a replay for each --replay flag. Replays loop until shutdown.
 * @param registry - The slots.
 * @param replays - The requested replays.
 * @returns The running replays.
 */
function startReplays(registry: SlotRegistry, replays: readonly ReplaySource[]): FileReplayReceiver[] {

  const receivers: FileReplayReceiver[] = [];

  for(const { file, slot: index } of replays) {

    const slot = registry.get(index);

    if(!slot) {

      LOG.error("Cannot replay %s: there is no slot %d.", file, index);

      continue;
    }

    const receiver = new FileReplayReceiver({ callbacks: slot, file, loop: true });

    receiver.run().catch((error: unknown): void => {

      LOG.error("Replay of %s into %s failed: %s.", file, slot.serviceName, formatError(error));
    });

    receivers.push(receiver);
  }

  return receivers;
}

/*
 * SERVER STARTUP
 *
 * The startServer function initializes configuration and logging, creates the slots and the recording session, and starts the Express application.
 */

/**
 * Initializes and starts the HTTP server.
 * @param options - Options from the command line.
 */
export async function startServer(options: ServerOptions): Promise<void> {

  const { consoleLogging } = options;

  // Set logging mode early before any log calls.
  setConsoleLogging(consoleLogging);

  // Apply console-stamp for timestamps only when using console logging.
  if(consoleLogging) {

    consoleStamp.default(console, { format: ":date(yyyy/mm/dd HH:MM:ss.l)" });
  }

  let result: ConfigurationResult;

  // Initialize configuration from file, environment variables and flags, then validate.
  try {

    result = await initializeConfiguration({ logFile: options.logFile, port: options.port, recordingsDirectory: options.recordingsDirectory });
    validateConfiguration(result.config);
  } catch(error) {

    LOG.error(formatError(error));

    process.exit(1);
  }

  const config: Config = result.config;

  if(result.parseError) {

    LOG.warn("Ignoring config.json, which could not be parsed: %s", result.parseErrorMessage ?? "unknown error.");
  }

  displayConfiguration(config);

  if(isAnyDebugEnabled()) {

    LOG.info("  Debug categories: %s", getCurrentPattern());
  }

  // Ensure the data directory exists before the file logger writes into it.
  await fs.mkdir(getDataDir(), { recursive: true });

  if(!consoleLogging) {

    await initializeFileLogger(getLogFilePath(config), config.logging.maxSize);
  }

  // ffmpeg is only needed for previews. Recording never depends on it.
  const ffmpegPath = config.preview.enabled ? await resolveFFmpegPath(config.preview.ffmpegPath) : undefined;

  if(ffmpegPath) {

    LOG.info("Using FFmpeg at: %s", ffmpegPath);
  }

  const connectionLog = new ConnectionLog();
  const registry = new SlotRegistry({ config, connectionLog, ffmpegPath });
  const session = new RecordingSession({ config: config.recording, targets: registry.slots });

  registry.bindSession(session);

  const context: RouteContext = { config, connectionLog, ffmpegAvailable: ffmpegPath !== undefined, registry, session };
  const app = buildApp(context);

  const server = app.listen(config.server.port, config.server.host, (): void => {

    LOG.info("NalVault is now listening on %s:%s.", config.server.host, config.server.port);
  });

  server.on("error", (error: Error): void => {

    LOG.error("HTTP server error: %s.", formatError(error));

    process.exit(1);
  });

  setupGracefulShutdown(context, startReplays(registry, options.replays), server, consoleLogging);

  if(options.record) {

    const info = await session.start();

    LOG.info("Recording into %s.", info.directory);
  }
}
