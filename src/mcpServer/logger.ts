/* Logger for mcpServer
 * - default: write to stderr (stdout carries JSON-RPC)
 * - supports JSON mode and plain text
 * - level controlled by GANTT_MCP_LOG_LEVEL (error,warn,info,debug)
 * - test hook: collect logs in memory when enableMemoryHook() was called
 */
import { Writable } from 'stream';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LEVELS: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export interface LogRecord {
  timestamp: string;
  level: LogLevel;
  msg: string;
  correlationId?: string | null;
  extra?: Record<string, unknown> | null;
}

/**
 * 文字列がログレベル名かを判定する。
 */
function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LEVELS, value);
}

/**
 * 処理名: LoggerClass（ロギングユーティリティ）
 * 処理概要: レベル付きログを標準エラー出力へ書き出す。JSON 形式出力とテスト用のメモリフックを持つ。
 * 実装理由: stdout は JSON-RPC 専用のため、ログはすべて stderr に書き出す。
 */
class LoggerClass {
  private level: LogLevel;
  private json: boolean;
  private out: Writable;
  private memory: LogRecord[] | null = null;

  /**
   * 処理名: コンストラクタ
   * 処理概要: 環境変数 `GANTT_MCP_LOG_LEVEL` と `GANTT_MCP_LOG_JSON` からレベルと出力形式を決める。
   */
  constructor() {
    const envLevel = process.env.GANTT_MCP_LOG_LEVEL;
    this.level = isLogLevel(envLevel) ? envLevel : 'info';
    this.json = (process.env.GANTT_MCP_LOG_JSON || '0') === '1';
    this.out = process.stderr;
  }

  enableMemoryHook() {
    this.memory = [];
  }

  disableMemoryHook() {
    this.memory = null;
  }

  /**
   * メモリに収集したログのコピーを返す。
   * @returns {LogRecord[]} ログレコードの配列コピー
   */
  getMemory(): LogRecord[] {
    return this.memory ? [...this.memory] : [];
  }

  /**
   * 処理名: setLevel（ログレベル設定）
   * 処理概要: 実行中に出力レベルを変更する。未知のレベル名は無視する。
   * @param {string} l 設定するログレベル
   */
  setLevel(l: string) {
    if (!isLogLevel(l)) return;
    this.level = l;
  }

  setJson(enabled: boolean) {
    this.json = enabled;
  }

  /**
   * 出力先を差し替える（既定は stderr）。
   */
  setOutput(out: Writable) {
    this.out = out;
  }

  private shouldLog(l: LogLevel) {
    return LEVELS[l] <= LEVELS[this.level];
  }

  /**
   * 処理名: record（ログ記録・出力内部処理）
   * 処理概要: ログレコードを組み立て、メモリフックへ追加した上で出力先へ 1 行で書き出す。
   */
  private record(level: LogLevel, msg: string, correlationId?: string | null, extra?: Record<string, unknown> | null) {
    const rec: LogRecord = {
      timestamp: new Date().toISOString(),
      level,
      msg,
      correlationId: correlationId ?? null,
      extra: extra ?? null,
    };

    if (this.memory) this.memory.push(rec);

    const outStr = this.json ? JSON.stringify(rec) : `[${rec.timestamp}] ${rec.level.toUpperCase()}: ${rec.msg}${rec.correlationId ? ' cid=' + rec.correlationId : ''}${rec.extra ? ' ' + JSON.stringify(rec.extra) : ''}`;
    this.out.write(outStr + '\n');
  }

  error(msg: string, correlationId?: string | null, extra?: Record<string, unknown> | null) {
    if (!this.shouldLog('error')) return;
    this.record('error', msg, correlationId, extra);
  }

  warn(msg: string, correlationId?: string | null, extra?: Record<string, unknown> | null) {
    if (!this.shouldLog('warn')) return;
    this.record('warn', msg, correlationId, extra);
  }

  info(msg: string, correlationId?: string | null, extra?: Record<string, unknown> | null) {
    if (!this.shouldLog('info')) return;
    this.record('info', msg, correlationId, extra);
  }

  debug(msg: string, correlationId?: string | null, extra?: Record<string, unknown> | null) {
    if (!this.shouldLog('debug')) return;
    this.record('debug', msg, correlationId, extra);
  }
}

const Logger = new LoggerClass();

export default Logger;

/**
 * Render an unknown thrown value as a log-friendly message.
 * @param {unknown} err thrown value
 * @returns {string} message
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
