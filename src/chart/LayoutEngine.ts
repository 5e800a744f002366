import { FALLBACK_COLOR } from './color';
import { daysBetween, fromEpochDay, monthStarts, toEpochDay, weekBoundaries } from './dates';
import { EmptyDatasetError, InvalidDateRangeError } from './errors';
import { extractPhases } from './TaskRecordBuilder';
import type {
    BarPrimitive,
    ChartTheme,
    GridlinePrimitive,
    HexColor,
    LegendEntry,
    RenderPlan,
    TaskRecord,
} from './types';

export const CHART_TITLE = 'Project Timeline';

/** 週グリッド線 (薄い) と月グリッド線 (濃い) の不透明度 */
export const GRID_OPACITY = { week: 0.3, month: 0.6 } as const;

interface PlacedTask {
    task: TaskRecord;
    startDay: number;
    endDay: number;
    span: number;
}

/**
 * タスクの開始日・終了日をエポック日へ変換する。
 * @throws InvalidDateRangeError 日付として扱えない場合
 */
function placeTask(task: TaskRecord): PlacedTask {
    const startDay = toEpochDay(task.start);
    if (startDay === null) throw new InvalidDateRangeError(task.row, 'start', task.start);
    const endDay = toEpochDay(task.end);
    const span = daysBetween(task.start, task.end);
    if (endDay === null || span === null) throw new InvalidDateRangeError(task.row, 'end', task.end);
    return { task, startDay, endDay, span };
}

/**
 * フェーズに対応する色。フェーズなし・割当なしは固定のフォールバック色。
 */
export function colorForPhase(phase: string | undefined, theme: ChartTheme): HexColor {
    if (phase === undefined) return FALLBACK_COLOR;
    return Object.prototype.hasOwnProperty.call(theme.phaseColors, phase) ? theme.phaseColors[phase] : FALLBACK_COLOR;
}

/**
 * 処理名: バー生成
 * 処理概要: 開始日順に並んだタスクから、縦位置 (最も早いタスクが最上段)・幅・色・ラベルを持つバーを作る。
 *          表示日数は max(1, 終了日 - 開始日)。保存されている日付自体は変更しない。
 */
function buildBars(sorted: PlacedTask[], theme: ChartTheme): BarPrimitive[] {
    const n = sorted.length;
    return sorted.map(({ task, startDay, span }, i) => {
        const width = Math.max(1, span);
        return {
            slot: n - 1 - i,
            task: task.name,
            phase: task.phase ?? null,
            start: task.start,
            end: task.end,
            x: startDay,
            width,
            color: colorForPhase(task.phase, theme),
            label: {
                text: task.durationLabel ?? `${width}d`,
                x: startDay + width / 2,
            },
        };
    });
}

/**
 * 週 (日曜日) と月初のグリッド線を生成する。週→月の順、それぞれ日付昇順。
 */
function buildGridlines(startDay: number, endDay: number, grid: HexColor): GridlinePrimitive[] {
    const weekly = weekBoundaries(startDay, endDay).map((day): GridlinePrimitive => ({
        date: fromEpochDay(day),
        x: day,
        weight: 'week',
        color: grid,
        opacity: GRID_OPACITY.week,
        style: 'dashed',
    }));
    const monthly = monthStarts(startDay, endDay).map((day): GridlinePrimitive => ({
        date: fromEpochDay(day),
        x: day,
        weight: 'month',
        color: grid,
        opacity: GRID_OPACITY.month,
        style: 'solid',
    }));
    return [...weekly, ...monthly];
}

function buildLegend(tasks: readonly TaskRecord[], theme: ChartTheme): LegendEntry[] {
    return extractPhases(tasks).map(phase => ({ phase, color: colorForPhase(phase, theme) }));
}

/**
 * 処理名: チャートレイアウト計算
 * 処理概要: タスクレコードとテーマから描画プランを作成する。タスクは開始日で安定ソートし、
 *          バー・グリッド線・軸ラベル・凡例を描画側がそのまま使える単位 (エポック日) で返す。
 *          描画ライブラリの状態には一切触れない。
 * 実装理由: 描画側が日付計算をせずに済むよう、位置はすべてエポック日の数値で渡す。
 * @param tasks タスクレコード
 * @param theme チャートテーマ
 * @returns 描画プラン
 * @throws EmptyDatasetError タスクが 0 件
 * @throws InvalidDateRangeError 日付を比較できないタスクがある
 */
export function layout(tasks: readonly TaskRecord[], theme: ChartTheme): RenderPlan {
    if (tasks.length === 0) throw new EmptyDatasetError();

    const placed = tasks.map(placeTask);
    // Array.prototype.sort は安定ソート
    const sorted = [...placed].sort((a, b) => a.startDay - b.startDay);

    const minStart = Math.min(...placed.map(p => p.startDay));
    const maxEnd = Math.max(...placed.map(p => p.endDay));

    const bars = buildBars(sorted, theme);
    const axisLabels = bars
        .map(bar => ({ slot: bar.slot, text: bar.task }))
        .sort((a, b) => a.slot - b.slot);

    return {
        title: CHART_TITLE,
        background: theme.background,
        gridColor: theme.grid,
        range: {
            start: fromEpochDay(minStart),
            end: fromEpochDay(maxEnd),
            startDay: minStart,
            endDay: maxEnd,
        },
        bars,
        gridlines: buildGridlines(minStart, maxEnd, theme.grid),
        axisLabels,
        legend: buildLegend(tasks, theme),
    };
}
