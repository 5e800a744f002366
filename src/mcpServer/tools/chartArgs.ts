import { RpcError, objectArg, stringArrayArg } from './Tool';
import { isThemePresetName } from '../../chart/color';
import { ROLES } from '../../chart/types';
import type { CellValue, RawRow, RawTable, Role } from '../../chart/types';
import type { ThemeInput } from '../services/ChartService';

function isRole(key: string): key is Role {
    return (ROLES as readonly string[]).includes(key);
}

function toCell(value: unknown): CellValue {
    if (value === null || value === undefined) return null;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
    return JSON.stringify(value);
}

/**
 * 処理名: テーブル引数の解析
 * 処理概要: { columns: string[], rows: object[] } 形式の引数を RawTable に変換する。
 *          rows の各要素はオブジェクト（列名→値）または配列（columns と同じ順）を受け付ける。
 */
export function tableArg(args: Record<string, unknown>, key = 'table'): RawTable | undefined {
    const raw = objectArg(args, key);
    if (!raw) return undefined;
    const columns = stringArrayArg(raw, 'columns');
    const rowsValue = raw.rows;
    if (!Array.isArray(rowsValue)) throw new RpcError(-32602, `Invalid params: ${key}.rows must be an array`);
    const rows = rowsValue.map((item: unknown, i): RawRow => {
        const row: RawRow = {};
        if (Array.isArray(item)) {
            columns.forEach((column, c) => {
                row[column] = toCell(item[c]);
            });
            return row;
        }
        if (item === null || typeof item !== 'object') throw new RpcError(-32602, `Invalid params: ${key}.rows[${i}] must be an object or array`);
        const fields = new Map(Object.entries(item));
        for (const column of columns) row[column] = toCell(fields.get(column));
        return row;
    });
    return { columns, rows };
}

/**
 * 処理名: マッピング引数の解析
 * 処理概要: 役割名→列名のオブジェクトを取り出す。未知の役割名や文字列以外の値は Invalid params。
 */
export function mappingArg(args: Record<string, unknown>, key = 'mapping'): Partial<Record<Role, string>> | undefined {
    const raw = objectArg(args, key);
    if (!raw) return undefined;
    const mapping: Partial<Record<Role, string>> = {};
    for (const [role, column] of Object.entries(raw)) {
        if (!isRole(role)) throw new RpcError(-32602, `Invalid params: unknown role ${role}`);
        if (typeof column !== 'string') throw new RpcError(-32602, `Invalid params: ${key}.${role} must be a string`);
        mapping[role] = column;
    }
    return mapping;
}

/**
 * テーマ引数 { preset?, background?, grid?, phaseColors? } を取り出す。色の妥当性はテーマ解決時に検証する。
 */
export function themeArg(args: Record<string, unknown>, key = 'theme'): ThemeInput | undefined {
    const raw = objectArg(args, key);
    if (!raw) return undefined;
    const theme: ThemeInput = {};
    if (raw.preset !== undefined) {
        if (!isThemePresetName(raw.preset)) throw new RpcError(-32602, `Invalid params: ${key}.preset must be "dark" or "light"`);
        theme.preset = raw.preset;
    }
    if (raw.background !== undefined) theme.background = raw.background;
    if (raw.grid !== undefined) theme.grid = raw.grid;
    const phaseColors = objectArg(raw, 'phaseColors');
    if (phaseColors) theme.phaseColors = phaseColors;
    return theme;
}

/**
 * 保存済みテーマの上に指定テーマを重ねる。指定されたフェーズ配色は個別に上書きする。
 * 指定テーマがプリセットを選んだ場合、保存済みの背景・グリッド色は引き継がない。
 */
export function mergeTheme(base: ThemeInput | undefined, override: ThemeInput | undefined): ThemeInput | undefined {
    if (!base) return override;
    if (!override) return base;
    const keepBase = override.preset === undefined;
    return {
        preset: override.preset ?? base.preset,
        background: override.background ?? (keepBase ? base.background : undefined),
        grid: override.grid ?? (keepBase ? base.grid : undefined),
        phaseColors: { ...(base.phaseColors ?? {}), ...(override.phaseColors ?? {}) },
    };
}
