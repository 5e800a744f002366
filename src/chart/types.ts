/**
 * 処理名: セル値型
 * 処理概要: スプレッドシートのセルから読み込まれる値。空セルは null で表す。
 */
export type CellValue = string | number | boolean | Date | null;

/**
 * 処理名: 生データ行
 * 処理概要: 列名からセル値への対応。列名は読み込み元ファイルのヘッダ行に従う。
 */
export type RawRow = Record<string, CellValue>;

/**
 * 処理名: 生データテーブル
 * 処理概要: 列名（ヘッダ順）と行配列の組。
 */
export interface RawTable {
    columns: string[];
    rows: RawRow[];
}

export const ROLES = ['task', 'start_date', 'end_date', 'phase', 'duration'] as const;

export type Role = typeof ROLES[number];

export const MANDATORY_ROLES: readonly Role[] = ['task', 'start_date', 'end_date'];

/**
 * 処理名: 役割マッピング
 * 処理概要: 意味的な役割から実際の列名への対応。task/start_date/end_date は必須。
 */
export interface RoleMapping {
    task: string;
    start_date: string;
    end_date: string;
    phase?: string;
    duration?: string;
}

/** ISO 形式の暦日 (YYYY-MM-DD) */
export type CalendarDate = string;

/** #rrggbb (小文字) */
export type HexColor = string;

/**
 * 処理名: タスクレコード
 * 処理概要: 1 行から生成される描画対象のタスク。生成後は変更しない。
 */
export interface TaskRecord {
    readonly row: number;
    readonly name: string;
    readonly start: CalendarDate;
    readonly end: CalendarDate;
    readonly phase?: string;
    readonly durationLabel?: string;
}

export type PhaseColorMap = Record<string, HexColor>;

export interface ChartTheme {
    background: HexColor;
    grid: HexColor;
    phaseColors: PhaseColorMap;
}

export interface BarPrimitive {
    slot: number;
    task: string;
    phase: string | null;
    start: CalendarDate;
    end: CalendarDate;
    /** 開始日 (エポック日) */
    x: number;
    /** 表示日数。最小 1 */
    width: number;
    color: HexColor;
    label: { text: string; x: number };
}

export type GridlineWeight = 'week' | 'month';

export interface GridlinePrimitive {
    date: CalendarDate;
    x: number;
    weight: GridlineWeight;
    color: HexColor;
    opacity: number;
    style: 'dashed' | 'solid';
}

export interface AxisLabel {
    slot: number;
    text: string;
}

export interface LegendEntry {
    phase: string;
    color: HexColor;
}

export interface RenderPlan {
    title: string;
    background: HexColor;
    gridColor: HexColor;
    range: { start: CalendarDate; end: CalendarDate; startDay: number; endDay: number };
    bars: BarPrimitive[];
    gridlines: GridlinePrimitive[];
    axisLabels: AxisLabel[];
    legend: LegendEntry[];
}
