import {
    addDays,
    differenceInCalendarDays,
    eachMonthOfInterval,
    eachWeekOfInterval,
    format,
    isValid,
    parse,
    parseISO,
} from 'date-fns';
import * as XLSX from 'xlsx';
import type { CalendarDate, CellValue } from './types';

/** エポック日 0。date-fns はローカル時刻で暦日を扱うため、ローカルの 1970-01-01 を基準にする */
const EPOCH = new Date(1970, 0, 1);

const CALENDAR_FORMAT = 'yyyy-MM-dd';

/** 文字列セルで受け付ける書式 (時刻部分は事前に落とす) */
const TEXT_FORMATS = ['yyyy-M-d', 'M/d/yyyy', 'yyyy/M/d'] as const;

const ISO_DATE_PART = /^(\d{4}-\d{1,2}-\d{1,2})[T ]/;

function toDay(date: Date): number {
    return differenceInCalendarDays(date, EPOCH);
}

/**
 * エポック日を ISO 暦日文字列に変換する。
 * @param epochDay 1970-01-01 からの日数
 * @returns YYYY-MM-DD
 */
export function fromEpochDay(epochDay: number): CalendarDate {
    return format(addDays(EPOCH, Math.floor(epochDay)), CALENDAR_FORMAT);
}

/**
 * ISO 暦日文字列を Date (ローカル 0 時) にする。YYYY-MM-DD 以外や存在しない日付は null。
 */
export function parseCalendarDate(date: CalendarDate): Date | null {
    if (!/^\d{4}-\d{2}-\d{2}$/.test(date)) return null;
    const parsed = parseISO(date);
    return isValid(parsed) ? parsed : null;
}

/**
 * ISO 暦日文字列をエポック日に変換する。解釈できない場合は null。
 * @param date YYYY-MM-DD
 * @returns エポック日または null
 */
export function toEpochDay(date: CalendarDate): number | null {
    const parsed = parseCalendarDate(date);
    return parsed === null ? null : toDay(parsed);
}

/**
 * Excel (1900 年方式) のシリアル値を暦日にする。小数部 (時刻) は捨てる。
 */
function fromSerial(serial: number): CalendarDate | null {
    const code = XLSX.SSF.parse_date_code(serial);
    if (!code) return null;
    const date = new Date(code.y, code.m - 1, code.d);
    return isValid(date) ? format(date, CALENDAR_FORMAT) : null;
}

/**
 * 処理名: 日付正規化
 * 処理概要: セル値を暦日に変換する。Date (UTC の暦日)、Excel シリアル値、
 *          ISO (YYYY-MM-DD、時刻付き可)、M/D/YYYY、YYYY/M/D を受け付ける。
 * 実装理由: 時刻付き ISO 文字列は書かれた暦日を採用し、タイムゾーンで日付をずらさない。
 * @param value セル値
 * @returns 暦日。解釈できない場合は null
 */
export function normalizeDate(value: CellValue | undefined): CalendarDate | null {
    if (value === null || value === undefined || typeof value === 'boolean') return null;

    if (value instanceof Date) {
        return isValid(value) ? value.toISOString().slice(0, 10) : null;
    }

    if (typeof value === 'number') {
        if (!Number.isFinite(value) || value < 1) return null;
        return fromSerial(value);
    }

    let text = value.trim();
    // 年は 4 桁のみ
    if (!/\d{4}/.test(text)) return null;
    const isoDate = ISO_DATE_PART.exec(text);
    if (isoDate) text = isoDate[1];
    for (const pattern of TEXT_FORMATS) {
        const parsed = parse(text, pattern, EPOCH);
        if (isValid(parsed)) return format(parsed, CALENDAR_FORMAT);
    }
    return null;
}

/**
 * 2 つの暦日の日数差 (end - start)。
 */
export function daysBetween(start: CalendarDate, end: CalendarDate): number | null {
    const from = parseCalendarDate(start);
    const to = parseCalendarDate(end);
    if (from === null || to === null) return null;
    return differenceInCalendarDays(to, from);
}

/**
 * 指定範囲 [startDay, endDay] に含まれる日曜日 (週の区切り) を列挙する。
 */
export function weekBoundaries(startDay: number, endDay: number): number[] {
    if (endDay < startDay) return [];
    const interval = { start: addDays(EPOCH, startDay), end: addDays(EPOCH, endDay) };
    // 先頭は開始日を含む週の日曜日なので、範囲より前なら落とす
    return eachWeekOfInterval(interval, { weekStartsOn: 0 })
        .map(toDay)
        .filter(day => day >= startDay);
}

/**
 * 指定範囲 [startDay, endDay] に含まれる月初日を列挙する。
 */
export function monthStarts(startDay: number, endDay: number): number[] {
    if (endDay < startDay) return [];
    const interval = { start: addDays(EPOCH, startDay), end: addDays(EPOCH, endDay) };
    return eachMonthOfInterval(interval)
        .map(toDay)
        .filter(day => day >= startDay);
}
