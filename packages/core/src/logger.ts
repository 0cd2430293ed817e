import { appendFileSync, mkdirSync, readdirSync, readFileSync, statSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import type { LogObject } from "consola";
import consola from "consola";

const DEFAULT_LOG_DIR = join(homedir(), ".rcf", "logs");

const LOG_LEVEL_LABELS: Record<number, string> = {
  0: "FATAL",
  1: "ERROR",
  2: "WARN",
  3: "INFO",
  4: "DEBUG",
  5: "TRACE",
};

export const LOG_SOURCES = ["serve", "cli"] as const;

export type LogSource = (typeof LOG_SOURCES)[number];

let logDir = DEFAULT_LOG_DIR;
let currentSource: LogSource = "serve";
let initialized = false;

function formatLogLevel(level: number): string {
  return (LOG_LEVEL_LABELS[level] ?? "LOG").padEnd(5);
}

function getLogFilePath(source: LogSource): string {
  const now = new Date();
  const year = now.getFullYear();
  const month = String(now.getMonth() + 1).padStart(2, "0");
  const day = String(now.getDate()).padStart(2, "0");
  return join(logDir, `${source}-${year}-${month}-${day}.log`);
}

/**
 * ログ 1 行を整形する
 * 例: 2026-01-29T12:34:56.789Z INFO  [rocketchat] GET /channels.list
 */
export function formatLogLine(logObj: Pick<LogObject, "level" | "args">, date = new Date()): string {
  const args = logObj.args
    .map((a) => (typeof a === "string" ? a : a instanceof Error ? a.message : JSON.stringify(a)))
    .join(" ");
  return `${date.toISOString()} ${formatLogLevel(logObj.level)} ${args}\n`;
}

/**
 * ファイルロガーをセットアップする
 * @param source - ログソース識別子 ("serve" | "cli")
 * @param dir - ログディレクトリ (省略時は ~/.rcf/logs)
 */
export function setupFileLogger(source: LogSource = "serve", dir?: string): void {
  if (initialized) return;
  initialized = true;
  currentSource = source;
  if (dir) logDir = dir;

  mkdirSync(logDir, { recursive: true });

  consola.addReporter({
    log(logObj: LogObject) {
      try {
        appendFileSync(getLogFilePath(currentSource), formatLogLine(logObj));
      } catch {
        // ログ書き込み失敗時はサイレントに無視(コンソール出力は継続)
      }
    },
  });
}

// ---------------------------------------------------------------------------
// ログ読み取り API
// ---------------------------------------------------------------------------

export interface LogEntry {
  timestamp: string;
  level: string;
  message: string;
}

export interface LogFileInfo {
  source: LogSource;
  date: string;
  filename: string;
  size: number;
}

export function isLogSource(value: string): value is LogSource {
  return LOG_SOURCES.some((source) => source === value);
}

/**
 * 利用可能なログファイル一覧を取得
 */
export function listLogFiles(dir: string = logDir): LogFileInfo[] {
  try {
    mkdirSync(dir, { recursive: true });
    const files = readdirSync(dir, { withFileTypes: true });
    const logFiles: LogFileInfo[] = [];

    for (const file of files) {
      if (!file.isFile() || !file.name.endsWith(".log")) continue;

      // ファイル名パターン: {source}-{YYYY}-{MM}-{DD}.log
      const match = file.name.match(/^([a-z]+)-(\d{4})-(\d{2})-(\d{2})\.log$/);
      if (!match) continue;

      const [, source, year, month, day] = match;
      if (!isLogSource(source)) continue;
      logFiles.push({
        source,
        date: `${year}-${month}-${day}`,
        filename: file.name,
        size: statSync(join(dir, file.name)).size,
      });
    }

    return logFiles.sort((a, b) => {
      // 日付降順、同日ならソース名でソート
      const dateCompare = b.date.localeCompare(a.date);
      if (dateCompare !== 0) return dateCompare;
      return a.source.localeCompare(b.source);
    });
  } catch (error) {
    consola.warn("[logger] Failed to list log files:", error);
    return [];
  }
}

/**
 * 指定されたログファイルの内容を読み取る
 */
export function readLogFile(
  source: LogSource,
  date: string,
  options?: { limit?: number; offset?: number; dir?: string },
): LogEntry[] {
  const limit = options?.limit ?? 500;
  const offset = options?.offset ?? 0;
  const dir = options?.dir ?? logDir;

  let content: string;
  try {
    content = readFileSync(join(dir, `${source}-${date}.log`), "utf-8");
  } catch {
    // ファイルが存在しない場合は空
    return [];
  }

  const entries: LogEntry[] = [];

  for (const line of content.trim().split("\n")) {
    // パターン: 2026-01-29T12:34:56.789Z INFO  message
    const match = line.match(/^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z)\s+(\w+)\s+(.*)$/);
    if (match) {
      entries.push({
        timestamp: match[1],
        level: match[2].trim(),
        message: match[3],
      });
    }
  }

  // タイムスタンプで新しい順にソートしてからページング
  entries.sort((a, b) => b.timestamp.localeCompare(a.timestamp));
  return entries.slice(offset, offset + limit);
}
