import { buildApp } from "./app.js";
import { openAppDb } from "./db/database.js";
import type { Logger } from "./utils/logger.js";

export interface ServeOptions {
  dbPath: string;
  port: number;
  host: string;
  logger: Logger;
}

export async function startServer({ dbPath, port, host, logger }: ServeOptions) {
  const db = openAppDb(dbPath);
  const app = buildApp({ db, logger, dbPath });
  app.addHook("onClose", async () => {
    db.close();
  });

  await app.listen({ port, host });
  app.log.info(`Server listening on http://${host}:${port}`);
  return app;
}
