import Fastify from "fastify";
import cors from "@fastify/cors";
import multipart from "@fastify/multipart";
import { z } from "zod";
import type { DatabaseClient } from "./db/types.js";
import { getConversation, searchConversations } from "./services/conversations.js";
import { listGroups, messagesForContacts, summarizeGroup } from "./services/groups.js";
import { importDirectory, importDocument } from "./services/imports.js";
import { parseGroupKey } from "./services/reconcile.js";
import { Store } from "./services/store.js";
import type { Logger } from "./utils/logger.js";

const MAX_UPLOAD_BYTES = 20 * 1024 * 1024;

const searchSchema = z.object({
  q: z.string().default(""),
  limit: z.coerce.number().int().min(1).max(200).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

const idParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

const importSchema = z.object({
  directory: z.string().min(1),
});

export interface BuildAppOptions {
  db: DatabaseClient;
  logger: Logger;
  dbPath?: string;
}

export function buildApp({ db, logger, dbPath }: BuildAppOptions) {
  const app = Fastify({ loggerInstance: logger });
  const store = new Store(db);

  app.register(cors, { origin: true });
  app.register(multipart, { limits: { fileSize: MAX_UPLOAD_BYTES, files: 1 } });

  app.get("/api/v1/health", async () => ({ ok: true, dbPath: dbPath ?? null }));

  app.get("/api/v1/groups", async () => ({
    groups: listGroups(db).map(summarizeGroup),
  }));

  app.get("/api/v1/groups/:key", async (request, reply) => {
    const params = z.object({ key: z.string() }).safeParse(request.params);
    const contactIds = params.success ? parseGroupKey(params.data.key) : null;
    if (!contactIds) {
      return reply
        .status(400)
        .send({ error: "invalid_group_key", message: "Group key must be comma-separated contact ids" });
    }
    return messagesForContacts(db, contactIds);
  });

  app.get("/api/v1/conversations", async (request, reply) => {
    const parsed = searchSchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.status(400).send({ error: "invalid_request", message: parsed.error.message });
    }
    return searchConversations(db, parsed.data);
  });

  app.get("/api/v1/conversations/:id", async (request, reply) => {
    const params = idParamsSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: "invalid_request", message: params.error.message });
    }

    const conversation = getConversation(db, params.data.id);
    if (!conversation) {
      return reply.status(404).send({ error: "not_found", message: "Conversation not found" });
    }
    return conversation;
  });

  app.post("/api/v1/imports", async (request, reply) => {
    const parsed = importSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: "invalid_request", message: parsed.error.message });
    }

    try {
      return importDirectory(parsed.data.directory, { format: "sqlite", store }, logger);
    } catch (error) {
      const message = error instanceof Error ? error.message : "Import failed";
      return reply.status(400).send({ error: "import_failed", message });
    }
  });

  app.post("/api/v1/imports/document", async (request, reply) => {
    const mp = await request.file();
    if (!mp) {
      return reply.status(400).send({ error: "missing_file", message: "Upload file is required" });
    }

    const html = (await mp.toBuffer()).toString("utf8");
    return importDocument(store, mp.filename, html, logger);
  });

  app.get("/api/v1/imports", async () => ({ imports: store.listImports() }));

  app.get("/api/v1/imports/:id/warnings", async (request, reply) => {
    const params = idParamsSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: "invalid_request", message: params.error.message });
    }
    if (!store.getImport(params.data.id)) {
      return reply.status(404).send({ error: "not_found", message: "Import not found" });
    }
    return { warnings: store.listParseWarnings(params.data.id) };
  });

  return app;
}
