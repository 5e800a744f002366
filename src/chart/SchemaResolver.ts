import { SchemaError } from './errors';
import { MANDATORY_ROLES, ROLES } from './types';
import type { Role, RoleMapping } from './types';

export type RolePatternTable = ReadonlyArray<readonly [Role, readonly string[]]>;

/**
 * 役割ごとの候補部分文字列（優先度順）。
 * 行の順番が役割の処理順であり、先に処理された役割が列を確保する。
 */
export const ROLE_PATTERNS: RolePatternTable = [
    ['task', ['task', 'name', 'description']],
    ['start_date', ['start', 'begin']],
    ['end_date', ['end', 'finish']],
    ['phase', ['phase', 'category', 'group']],
    ['duration', ['duration', 'weeks', 'days']],
];

/**
 * 単一の役割について、未確保の列から最初に一致する列を探す。
 * @param patterns 優先度順の部分文字列
 * @param lowered 小文字化した列名（元の順序）
 * @param claimed 確保済みの列インデックス
 * @returns 一致した列インデックス。なければ -1
 */
function findColumn(patterns: readonly string[], lowered: string[], claimed: Set<number>): number {
    for (const pattern of patterns) {
        const needle = pattern.toLowerCase();
        for (let i = 0; i < lowered.length; i++) {
            if (claimed.has(i)) continue;
            if (lowered[i].includes(needle)) return i;
        }
    }
    return -1;
}

/**
 * 処理名: スキーマ解決
 * 処理概要: 列名の集合から各役割に対応する列を決定する。パターンは優先度順に試し、
 *          同一パターン内では表の列順で最初に一致した列を採用する。1 列は 1 役割にしか割り当てない。
 *          必須役割が 1 つでも解決できない場合は、未解決の必須役割をすべて列挙した SchemaError を投げる。
 * 実装理由: 列名はファイルごとに揺れるため、固定の列名ではなく部分一致のパターンで役割を決める。
 * @param columnNames 表の列名（ヘッダ順）
 * @param patterns 役割と候補パターンの表
 * @returns 役割マッピング
 */
export function resolveSchema(columnNames: readonly string[], patterns: RolePatternTable = ROLE_PATTERNS): RoleMapping {
    const lowered = columnNames.map(name => name.toLowerCase());
    const claimed = new Set<number>();
    const found = new Map<Role, string>();

    for (const [role, candidates] of patterns) {
        if (found.has(role)) continue;
        const index = findColumn(candidates, lowered, claimed);
        if (index < 0) continue;
        claimed.add(index);
        found.set(role, columnNames[index]);
    }

    const missing = MANDATORY_ROLES.filter(role => !found.has(role));
    const task = found.get('task');
    const start = found.get('start_date');
    const end = found.get('end_date');
    if (missing.length > 0 || task === undefined || start === undefined || end === undefined) {
        throw new SchemaError(missing);
    }

    const mapping: RoleMapping = { task, start_date: start, end_date: end };
    const phase = found.get('phase');
    const duration = found.get('duration');
    if (phase !== undefined) mapping.phase = phase;
    if (duration !== undefined) mapping.duration = duration;
    return mapping;
}

/**
 * 呼び出し側が指定したマッピングを検証する。存在しない列を指す役割は未解決として扱う。
 * @param columnNames 表の列名
 * @param candidate 指定されたマッピング
 * @returns 検証済みマッピング
 */
export function validateMapping(columnNames: readonly string[], candidate: Partial<Record<Role, string>>): RoleMapping {
    const present = new Set(columnNames);
    const missing: Role[] = [];
    for (const role of ROLES) {
        const column = candidate[role];
        if (column === undefined) {
            if (MANDATORY_ROLES.includes(role)) missing.push(role);
            continue;
        }
        if (!present.has(column)) missing.push(role);
    }
    const { task, start_date, end_date } = candidate;
    if (missing.length > 0 || task === undefined || start_date === undefined || end_date === undefined) {
        throw new SchemaError(missing);
    }
    const mapping: RoleMapping = { task, start_date, end_date };
    if (candidate.phase !== undefined) mapping.phase = candidate.phase;
    if (candidate.duration !== undefined) mapping.duration = candidate.duration;
    return mapping;
}
