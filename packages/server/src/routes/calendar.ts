/**
 * Calendar Route
 *
 * Serves the published iCalendar document. Each request opens the file
 * afresh, so readers follow the publisher's atomic renames without locking.
 * Before the first publish the route answers 404.
 */

import type { FastifyInstance } from "fastify";

export async function registerCalendarRoutes(
  fastify: FastifyInstance,
  fileName: string,
): Promise<void> {
  fastify.get(`/${fileName}`, async (_request, reply) => {
    return reply.header("Cache-Control", "no-cache").sendFile(fileName);
  });
}
