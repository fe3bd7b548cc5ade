/**
 * Status Routes
 *
 * Operator-facing view of the refresh loop. Subscribers never see errors;
 * they only get the last good calendar.
 */

import type { FastifyInstance } from "fastify";
import { stat } from "node:fs/promises";

interface ArtifactInfo {
  bytes: number;
  modifiedAt: string;
}

async function artifactInfo(path: string): Promise<ArtifactInfo | null> {
  try {
    const info = await stat(path);
    return { bytes: info.size, modifiedAt: info.mtime.toISOString() };
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return null;
    }
    throw err;
  }
}

export async function registerStatusRoutes(
  fastify: FastifyInstance,
): Promise<void> {
  /**
   * GET /status
   *
   * Scheduler state, counters and the last error, if any.
   */
  fastify.get("/status", async () => {
    return {
      refresh: fastify.refreshScheduler.getStatus(),
      artifact: await artifactInfo(fastify.outputPath),
    };
  });

  /**
   * GET /health
   *
   * 200 once a calendar has been published, 503 before.
   */
  fastify.get("/health", async (_request, reply) => {
    const artifact = await artifactInfo(fastify.outputPath);
    if (!artifact) {
      return reply.code(503).send({ ok: false });
    }
    return { ok: true };
  });
}
