import { isLogSource, LOG_SOURCES, listLogFiles, readLogFile } from "@repo/core";
import { Hono } from "hono";

export function createServerLogsRouter(logDir?: string) {
  const app = new Hono();

  /**
   * GET /api/server-logs/files
   * 利用可能なログファイル一覧を取得
   */
  app.get("/files", (c) => {
    const files = listLogFiles(logDir);
    return c.json({ files });
  });

  /**
   * GET /api/server-logs/:source/:date
   * 指定されたソースと日付のログを取得
   */
  app.get("/:source/:date", (c) => {
    const source = c.req.param("source");
    const date = c.req.param("date");
    const limit = Number(c.req.query("limit")) || 500;
    const offset = Number(c.req.query("offset")) || 0;

    if (!isLogSource(source)) {
      return c.json({ error: `Invalid source. Must be one of: ${LOG_SOURCES.join(", ")}` }, 400);
    }

    if (!/^\d{4}-\d{2}-\d{2}$/.test(date)) {
      return c.json({ error: "Invalid date format. Use YYYY-MM-DD" }, 400);
    }

    const entries = readLogFile(source, date, { limit, offset, dir: logDir });
    return c.json({ entries, source, date, limit, offset });
  });

  return app;
}
