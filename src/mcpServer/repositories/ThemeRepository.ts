import { v4 as uuidv4 } from 'uuid';
import type { SavedTheme, SettingRow, ThemeRow } from '../db/types';
import { getDatabase } from '../db/DatabaseManager';
import { resolveTheme } from '../../chart/color';
import { ThemeValidationError } from '../../chart/errors';
import type { ChartTheme } from '../../chart/types';

const COLOR_SETTINGS_KEY = 'color_settings';

/**
 * JSON 文字列をテーマ入力として読み、正規化したテーマを返す。
 * @param background 背景色
 * @param grid グリッド色
 * @param phaseColorsJson フェーズ配色 (JSON)
 * @returns ChartTheme
 */
function parseTheme(background: string, grid: string, phaseColorsJson: string): ChartTheme {
  const parsed: unknown = JSON.parse(phaseColorsJson);
  const phaseColors = parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)
    ? Object.fromEntries(Object.entries(parsed))
    : {};
  return resolveTheme({ background, grid, phaseColors });
}

function toSavedTheme(row: ThemeRow): SavedTheme {
  return {
    id: row.id,
    name: row.name,
    theme: parseTheme(row.background, row.grid, row.phase_colors),
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
}

/**
 * テーマ名を検証して前後の空白を取り除く。
 * @throws ThemeValidationError 空の名前
 */
function normalizeName(name: string): string {
  const trimmed = name.trim();
  if (trimmed.length === 0) throw new ThemeValidationError('Theme name must not be empty');
  return trimmed;
}

/**
 * 処理名: ThemeRepository（テーマ永続化レイヤ）
 * 処理概要: 名前付きテーマの一覧・取得・保存・削除と、直近の配色設定の読み書きを提供するリポジトリクラス
 * 実装理由: 接続の生成とキャッシュは DatabaseManager が持つため、ここではテーマ JSON の検証と行の変換だけを扱う。
 * @class
 */
export class ThemeRepository {
  constructor() { }

  /**
   * 処理名: テーマ一覧取得
   * 処理概要: themes テーブルから全件を名前順で取得して返す
   * @returns {Promise<SavedTheme[]>}
   */
  async listThemes(): Promise<SavedTheme[]> {
    const db = await getDatabase();
    const rows = await db.all<ThemeRow[]>(
      `SELECT id, name, background, grid, phase_colors, created_at, updated_at
       FROM themes
       ORDER BY name ASC`
    );
    return rows.map(toSavedTheme);
  }

  /**
   * 処理名: テーマ取得
   * 処理概要: 指定名のテーマを返す。存在しなければ null
   * @param {string} name
   * @returns {Promise<SavedTheme|null>}
   */
  async getTheme(name: string): Promise<SavedTheme | null> {
    const db = await getDatabase();
    const row = await db.get<ThemeRow>(
      `SELECT id, name, background, grid, phase_colors, created_at, updated_at
       FROM themes
       WHERE name = ?`,
      normalizeName(name)
    );
    return row ? toSavedTheme(row) : null;
  }

  /**
   * 処理名: テーマ保存
   * 処理概要: 同名のテーマがあれば上書きし、なければ新規作成する。保存後のレコードを返す
   * 実装理由: テーマは名前で指定されるため、同名の保存は id と created_at を保ったまま上書きする。
   * @param {string} name
   * @param {ChartTheme} theme
   * @returns {Promise<SavedTheme>}
   */
  async saveTheme(name: string, theme: ChartTheme): Promise<SavedTheme> {
    const db = await getDatabase();
    const key = normalizeName(name);
    const normalized = resolveTheme(theme);
    const now = new Date().toISOString();
    const existing = await db.get<{ id: string }>(`SELECT id FROM themes WHERE name = ?`, key);
    if (existing) {
      await db.run(
        `UPDATE themes
         SET background = ?,
             grid = ?,
             phase_colors = ?,
             updated_at = ?
         WHERE id = ?`,
        normalized.background,
        normalized.grid,
        JSON.stringify(normalized.phaseColors),
        now,
        existing.id
      );
    } else {
      await db.run(
        `INSERT INTO themes (
            id, name, background, grid, phase_colors, created_at, updated_at
         ) VALUES (?, ?, ?, ?, ?, ?, ?)`,
        uuidv4(),
        key,
        normalized.background,
        normalized.grid,
        JSON.stringify(normalized.phaseColors),
        now,
        now
      );
    }
    const saved = await this.getTheme(key);
    if (!saved) throw new Error(`Theme not found after save: ${key}`);
    return saved;
  }

  /**
   * 処理名: テーマ削除
   * @param {string} name
   * @returns {Promise<boolean>} 削除したら true
   */
  async deleteTheme(name: string): Promise<boolean> {
    const db = await getDatabase();
    const result = await db.run(`DELETE FROM themes WHERE name = ?`, normalizeName(name));
    return (result.changes ?? 0) > 0;
  }

  /**
   * 処理名: 直近の配色設定取得
   * 処理概要: settings テーブルの color_settings を読み出す。未保存なら null
   * @returns {Promise<ChartTheme|null>}
   */
  async getLastColorSettings(): Promise<ChartTheme | null> {
    const db = await getDatabase();
    const row = await db.get<SettingRow>(`SELECT key, value, updated_at FROM settings WHERE key = ?`, COLOR_SETTINGS_KEY);
    if (!row) return null;
    const parsed: unknown = JSON.parse(row.value);
    if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) return null;
    const value = new Map(Object.entries(parsed));
    const phaseColors = value.get('phaseColors');
    return resolveTheme({
      background: value.get('background'),
      grid: value.get('grid'),
      phaseColors: phaseColors !== null && typeof phaseColors === 'object' && !Array.isArray(phaseColors)
        ? Object.fromEntries(Object.entries(phaseColors))
        : {},
    });
  }

  /**
   * 処理名: 直近の配色設定保存
   * @param {ChartTheme} theme
   * @returns {Promise<ChartTheme>} 正規化して保存した設定
   */
  async saveLastColorSettings(theme: ChartTheme): Promise<ChartTheme> {
    const db = await getDatabase();
    const normalized = resolveTheme(theme);
    await db.run(
      `INSERT INTO settings (key, value, updated_at) VALUES (?, ?, ?)
       ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at`,
      COLOR_SETTINGS_KEY,
      JSON.stringify(normalized),
      new Date().toISOString()
    );
    return normalized;
  }
}

export default ThemeRepository;
