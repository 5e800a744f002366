import palettes from './palettes.json';
import { InvalidColorError, UnknownColormapError } from './errors';
import { compareText } from './TaskRecordBuilder';
import type { ChartTheme, HexColor, PhaseColorMap } from './types';

/** フェーズ未設定・割当なしのタスクに使う固定色 (steelblue) */
export const FALLBACK_COLOR: HexColor = '#4682b4';

export const DEFAULT_COLORMAP = 'Dark2';

const NAMED_COLORS: ReadonlyMap<string, HexColor> = new Map([
    ['black', '#000000'],
    ['white', '#ffffff'],
    ['blue', '#0000ff'],
    ['steelblue', '#4682b4'],
    ['red', '#ff0000'],
    ['green', '#008000'],
    ['gray', '#808080'],
    ['grey', '#808080'],
]);

const PALETTES: Record<string, readonly HexColor[]> = palettes;

const RECOMMENDED_COLORMAPS = ['Dark2', 'Set1', 'Set2', 'Set3', 'tab10', 'tab20', 'Paired', 'Accent', 'Pastel1', 'Pastel2'];

export const THEME_PRESETS = {
    dark: { background: '#1f2937', grid: '#ffffff' },
    light: { background: '#f8f9fa', grid: '#333333' },
} as const;

export type ThemePresetName = keyof typeof THEME_PRESETS;

/**
 * 0-255 の整数チャネル値を 2 桁の 16 進数にする。
 */
function channel(value: number): string {
    return Math.min(255, Math.max(0, Math.trunc(value))).toString(16).padStart(2, '0');
}

/**
 * 処理名: 色の正規化
 * 処理概要: 16 進表記 (#rgb / #rrggbb / #rrggbbaa)、RGB(A) 配列 (0-1 または 0-255)、
 *          一部の色名を受け付け、#rrggbb (小文字) に揃える。アルファは捨てる。
 * @param input 色の表現
 * @returns 正規化済みの色
 */
export function normalizeColor(input: unknown): HexColor {
    if (typeof input === 'string') {
        const text = input.trim().toLowerCase();
        const named = NAMED_COLORS.get(text);
        if (named !== undefined) return named;
        const short = /^#([0-9a-f])([0-9a-f])([0-9a-f])$/.exec(text);
        if (short) return `#${short[1]}${short[1]}${short[2]}${short[2]}${short[3]}${short[3]}`;
        const long = /^#([0-9a-f]{6})(?:[0-9a-f]{2})?$/.exec(text);
        if (long) return `#${long[1]}`;
        throw new InvalidColorError(input);
    }

    if (Array.isArray(input) && (input.length === 3 || input.length === 4)) {
        const values: number[] = [];
        for (const v of input) {
            if (typeof v !== 'number' || !Number.isFinite(v) || v < 0) throw new InvalidColorError(input);
            values.push(v);
        }
        const rgb = values.slice(0, 3);
        const unit = rgb.every(v => v <= 1);
        if (!unit && rgb.some(v => v > 255)) throw new InvalidColorError(input);
        return '#' + rgb.map(v => channel(unit ? v * 255 : v)).join('');
    }

    throw new InvalidColorError(input);
}

/**
 * 推奨カラーマップ名の一覧。
 */
export function listColormaps(): string[] {
    return [...RECOMMENDED_COLORMAPS];
}

/**
 * カラーマップの色配列を返す。
 * @throws UnknownColormapError
 */
export function getPalette(name: string): readonly HexColor[] {
    const palette = Object.prototype.hasOwnProperty.call(PALETTES, name) ? PALETTES[name] : undefined;
    if (!palette || palette.length === 0) throw new UnknownColormapError(name);
    return palette;
}

/**
 * 処理名: 配色生成
 * 処理概要: フェーズ一覧の順にカラーマップの色を巡回して割り当てる。
 * @param phases フェーズ名
 * @param colormap カラーマップ名
 * @returns フェーズ→色
 */
export function generateColorScheme(phases: readonly string[], colormap: string = DEFAULT_COLORMAP): PhaseColorMap {
    const palette = getPalette(colormap);
    return Object.fromEntries(phases.map((phase, i): [string, HexColor] => [phase, palette[i % palette.length]]));
}

/**
 * 処理名: フェーズ配色の補完
 * 処理概要: 部分的な割当を受け取り、割当のないフェーズへ昇順の並びでの位置に応じた
 *          パレット色を与える。指定済みの色は正規化して保持する。
 * 実装理由: フェーズ名は任意の文字列のため、Object のプロパティ名と重なっても割当が失われないようにする。
 * @param phases 対象フェーズ
 * @param partial 既存の割当
 * @param colormap 補完に使うカラーマップ
 * @returns すべてのフェーズを含む割当
 */
export function completeColorAssignment(
    phases: readonly string[],
    partial: Readonly<Record<string, unknown>> = {},
    colormap: string = DEFAULT_COLORMAP
): PhaseColorMap {
    const palette = getPalette(colormap);
    const sorted = [...new Set(phases)].sort(compareText);
    const result = new Map<string, HexColor>();
    for (const [phase, color] of Object.entries(partial)) {
        result.set(phase, normalizeColor(color));
    }
    sorted.forEach((phase, i) => {
        if (!result.has(phase)) result.set(phase, palette[i % palette.length]);
    });
    return Object.fromEntries(result);
}

export function isThemePresetName(value: unknown): value is ThemePresetName {
    return value === 'dark' || value === 'light';
}

/**
 * テーマ入力の色を正規化し、背景・グリッド色の欠落はプリセット (既定はダーク) で補う。
 */
export function resolveTheme(input: {
    preset?: ThemePresetName;
    background?: unknown;
    grid?: unknown;
    phaseColors?: Readonly<Record<string, unknown>>;
} = {}): ChartTheme {
    const preset = THEME_PRESETS[input.preset ?? 'dark'];
    const phaseColors: PhaseColorMap = Object.fromEntries(
        Object.entries(input.phaseColors ?? {}).map(([phase, color]): [string, HexColor] => [phase, normalizeColor(color)])
    );
    return {
        background: input.background === undefined ? preset.background : normalizeColor(input.background),
        grid: input.grid === undefined ? preset.grid : normalizeColor(input.grid),
        phaseColors,
    };
}
