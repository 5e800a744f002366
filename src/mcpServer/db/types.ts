import type { ChartTheme } from '../../chart/types';

/**
 * 処理名: ThemeRow 型
 * 処理概要: themes テーブルの 1 行。phase_colors は JSON 文字列で保持する
 */
export interface ThemeRow {
    id: string;
    name: string;
    background: string;
    grid: string;
    phase_colors: string;
    created_at: string;
    updated_at: string;
}

/**
 * 処理名: SavedTheme 型
 * 処理概要: 名前付きで保存されたチャートテーマ
 */
export interface SavedTheme {
    id: string;
    name: string;
    theme: ChartTheme;
    created_at: string;
    updated_at: string;
}

export interface SettingRow {
    key: string;
    value: string;
    updated_at: string;
}
