import sqlite3 from 'sqlite3';
import { open, Database } from 'sqlite';
import path from 'path';
import fs from 'fs';

const dbPromiseMap: Map<string, Promise<Database>> = new Map();

/**
 * 処理名: データベースパス解決
 *
 * 処理概要:
 * 環境変数 `GANTT_MCP_DATA_DIR` が設定されている場合はそのディレクトリを基準に、
 * 設定されていない場合はカレントワーキングディレクトリを基準にして
 * data/gantt.db の絶対パスを返します。
 *
 * 実装理由: テストやプロジェクトごとに保存先を分けられるよう、環境変数で切り替える。
 *
 * @returns {string} gantt.db ファイルへの絶対パス
 */
export function resolveDatabasePath(): string {
    const baseDir = process.env.GANTT_MCP_DATA_DIR && process.env.GANTT_MCP_DATA_DIR.trim().length > 0
        ? process.env.GANTT_MCP_DATA_DIR
        : process.cwd();

    const resolvedBase = path.resolve(baseDir);
    return path.join(resolvedBase, 'data', 'gantt.db');
}

/**
 * 処理名: データベース接続取得
 *
 * 処理概要:
 * データベースファイルを開き、その Promise をパスごとにキャッシュします。
 * 同じパスで複数回呼ばれた場合は既存の Promise を返します。
 *
 * @returns {Promise<Database>} sqlite の Database インスタンスを返す Promise
 */
export async function getDatabase(): Promise<Database> {
    const DB_PATH = resolveDatabasePath();
    const DB_DIR = path.dirname(DB_PATH);
    const cached = dbPromiseMap.get(DB_PATH);
    if (cached) return cached;

    if (!fs.existsSync(DB_DIR)) {
        fs.mkdirSync(DB_DIR, { recursive: true });
    }
    const p = open({ filename: DB_PATH, driver: sqlite3.Database });
    dbPromiseMap.set(DB_PATH, p);
    return p;
}

/**
 * 処理名: データベース接続クローズとキャッシュクリア
 *
 * 処理概要:
 * 現在のパスに対応する接続を閉じ、キャッシュから削除します。
 *
 * @returns {Promise<void>} クローズ完了を示す Promise
 */
export async function closeAndClearDatabase(): Promise<void> {
    const DB_PATH = resolveDatabasePath();
    const p = dbPromiseMap.get(DB_PATH);
    if (p) {
        try {
            const db = await p;
            await db.close();
        } finally {
            dbPromiseMap.delete(DB_PATH);
        }
    }
}

/**
 * 処理名: データベーススキーマ初期化
 *
 * 処理概要:
 * themes（保存済みテーマ）と settings（直近の配色設定などのキー・値）テーブルを
 * 存在しなければ作成します。何度実行しても既存データは変わりません。
 * 最後に接続を閉じてキャッシュから削除します。
 *
 * @returns {Promise<void>} 初期化完了を示す Promise
 */
export async function initializeDatabase(): Promise<void> {
    const DB_PATH = resolveDatabasePath();
    const db = await getDatabase();

    await db.exec(`
        CREATE TABLE IF NOT EXISTS themes (
            id TEXT PRIMARY KEY,
            name TEXT NOT NULL,
            background TEXT NOT NULL,
            grid TEXT NOT NULL,
            phase_colors TEXT NOT NULL DEFAULT '{}',
            created_at TEXT NOT NULL,
            updated_at TEXT NOT NULL,
            UNIQUE(name)
        )
    `);

    await db.exec(`
        CREATE TABLE IF NOT EXISTS settings (
            key TEXT PRIMARY KEY,
            value TEXT NOT NULL,
            updated_at TEXT NOT NULL
        )
    `);

    // close DB and remove from cache so test harness can delete files without locking issues
    try {
        await db.close();
    } finally {
        dbPromiseMap.delete(DB_PATH);
    }
}
