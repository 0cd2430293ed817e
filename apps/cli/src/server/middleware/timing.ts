import consola from "consola";
import type { Context, Next } from "hono";

/**
 * 処理時間計測ミドルウェア
 * - X-Response-Time ヘッダーに処理時間を付与
 */
export async function timingMiddleware(c: Context, next: Next) {
  const start = performance.now();

  await next();

  const durationMs = (performance.now() - start).toFixed(2);
  c.header("X-Response-Time", `${durationMs}ms`);
  consola.info(`[server/timing] ${c.req.method} ${c.req.path} ${c.res.status} - ${durationMs}ms`);
}
