import express, { type Express, type Response } from "express";
import { createHash } from "crypto";
import { createServer, type Server } from "http";
import { z } from "zod";
import { searchRequestSchema, toProviderDataWire, userSettingsPatchSchema } from "@shared/schema";
import type { AppContext } from "./context";
import { createLogger } from "./lib/logger";
import { CacheUnavailableError, SearchServiceError, errorMessage } from "./services/errors";
import type { SearchStats } from "./services/search/coordinator";
import { defaultUserSettings, type UserSettings } from "./services/settings";

const logger = createLogger("ris.routes");

const userIdParamSchema = z.coerce.number().int().nonnegative();

function serializeSettings(settings: UserSettings) {
  return {
    userId: settings.userId,
    enabledEngines: Array.from(settings.enabledEngines).sort(),
    cacheEnabled: settings.cacheEnabled,
    bestResultsOnly: settings.bestResultsOnly,
    broadcastMessageChatId: settings.broadcastMessageChatId,
    broadcastMessageId: settings.broadcastMessageId,
    searchCount: settings.searchCount,
  };
}

function errorBody(error: unknown): { status: number; body: { error: string; code: string; details?: unknown } } {
  if (error instanceof z.ZodError) {
    return { status: 400, body: { error: "Invalid request", code: "VALIDATION_ERROR", details: error.issues } };
  }
  if (error instanceof CacheUnavailableError) {
    return { status: 503, body: { error: error.message, code: error.code } };
  }
  if (error instanceof SearchServiceError) {
    return { status: 500, body: { error: error.message, code: error.code } };
  }
  return { status: 500, body: { error: errorMessage(error), code: "INTERNAL_ERROR" } };
}

function sendError(res: Response, scope: string, error: unknown): void {
  const { status, body } = errorBody(error);
  if (status >= 500) {
    logger.error(`${scope} error: ${errorMessage(error)}`);
  }
  res.status(status).json(body);
}

export function registerRoutes(app: Express, context: AppContext): Server {
  const { coordinator, results, settings: settingsRepository } = context;

  /**
   * Settings for a search. Without a user, or when the cache is down, the
   * defaults apply.
   */
  async function searchSettings(userId: number | null): Promise<UserSettings> {
    if (userId === null) {
      return defaultUserSettings(0);
    }
    try {
      const settings = await settingsRepository.fetch(userId);
      await settingsRepository.incrementSearchCount(userId);
      return settings;
    } catch (error) {
      if (!(error instanceof CacheUnavailableError)) throw error;
      logger.warn(`Settings unavailable for user ${userId}, using defaults: ${error.message}`);
      return defaultUserSettings(userId);
    }
  }

  // ========================================
  // SEARCH
  // ========================================

  // Streams one JSON document per line, then a summary line
  app.post("/api/search", async (req, res) => {
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableEnded) {
        controller.abort();
      }
    });

    const writeLine = (line: unknown) => {
      if (!res.headersSent) {
        res.status(200).type("application/x-ndjson");
      }
      res.write(`${JSON.stringify(line)}\n`);
    };

    try {
      const request = searchRequestSchema.parse(req.body);
      const imageId = request.imageId ?? createHash("md5").update(request.imageUrl).digest("hex");
      const settings = await searchSettings(request.userId !== undefined ? Number(request.userId) : null);

      let stats: SearchStats | null = null;
      for await (const item of coordinator.search(request.imageUrl, imageId, settings, {
        signal: controller.signal,
        onStats: (finished) => {
          stats = finished;
        },
      })) {
        writeLine(toProviderDataWire(item));
      }
      writeLine({ done: true, imageId, stats });
      res.end();
    } catch (error) {
      if (controller.signal.aborted) {
        logger.debug("Search cancelled by the client");
        return;
      }
      if (!res.headersSent) {
        sendError(res, "Search", error);
        return;
      }
      logger.error(`Search failed mid-stream: ${errorMessage(error)}`);
      writeLine({ error: errorMessage(error), code: errorBody(error).body.code });
      res.end();
    }
  });

  // ========================================
  // USER SETTINGS
  // ========================================

  app.get("/api/settings/:userId", async (req, res) => {
    try {
      const userId = userIdParamSchema.parse(req.params.userId);
      const settings = await settingsRepository.fetch(userId);
      res.json(serializeSettings(settings));
    } catch (error) {
      sendError(res, "Settings fetch", error);
    }
  });

  app.patch("/api/settings/:userId", async (req, res) => {
    try {
      const userId = userIdParamSchema.parse(req.params.userId);
      const patch = userSettingsPatchSchema.parse(req.body);

      const known = new Set(coordinator.engineNames);
      const unknown = (patch.enabledEngines ?? []).filter((name) => !known.has(name));
      if (unknown.length > 0) {
        return res.status(400).json({
          error: `Unknown search engines: ${unknown.join(", ")}`,
          code: "UNKNOWN_ENGINE",
        });
      }

      const settings = await settingsRepository.update(userId, patch);
      res.json(serializeSettings(settings));
    } catch (error) {
      sendError(res, "Settings update", error);
    }
  });

  // ========================================
  // CACHE MAINTENANCE
  // ========================================

  app.delete("/api/cache/not-found", async (req, res) => {
    try {
      const removed = await results.clearNotFoundCache();
      res.json({ success: true, removed });
    } catch (error) {
      sendError(res, "Clear not-found cache", error);
    }
  });

  app.delete("/api/cache/provider-data", async (req, res) => {
    try {
      const removed = await results.clearProviderDataCache();
      res.json({ success: true, removed });
    } catch (error) {
      sendError(res, "Clear provider data cache", error);
    }
  });

  // Health check endpoint
  app.get("/api/health", async (req, res) => {
    const cacheConnected = await context.cache.ping();
    res.json({
      status: cacheConnected ? "ok" : "degraded",
      timestamp: new Date().toISOString(),
      cache: { backend: context.cache.kind, connected: cacheConnected },
      engines: coordinator.engineNames,
    });
  });

  const httpServer = createServer(app);
  return httpServer;
}

/**
 * Express app with JSON bodies and every route registered.
 */
export function createApp(context: AppContext): Server {
  const app = express();
  app.use(express.json({ limit: "1mb" }));
  return registerRoutes(app, context);
}
