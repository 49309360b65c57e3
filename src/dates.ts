import { isExists } from 'date-fns';
import { CONFIG } from './config';
import type { FileStat } from './filesystem';

export interface CalendarDate {
    year: number;
    month: number;
    day: number;
}

const FILENAME_DATE = new RegExp(`^(?:${CONFIG.FILENAME_DATE_PREFIXES.join('|')})_(\\d{4})(\\d{2})(\\d{2})_`);

export function formatDate(date: CalendarDate): string {
    const yyyy = String(date.year).padStart(4, '0');
    const mm = String(date.month).padStart(2, '0');
    const dd = String(date.day).padStart(2, '0');
    return `${yyyy}-${mm}-${dd}`;
}

/**
 * Capture date embedded by the camera, e.g. `LRV_20240926_150746_01_003.lrv`.
 * Returns null when the name carries no date or the date does not exist.
 */
export function dateFromFilename(filename: string): CalendarDate | null {
    const match = FILENAME_DATE.exec(filename);
    if (!match) return null;

    const year = parseInt(match[1], 10);
    const month = parseInt(match[2], 10);
    const day = parseInt(match[3], 10);

    // Date maps years 0-99 onto 1900-1999; +400 keeps the leap-year cycle
    if (!isExists(year < 100 ? year + 400 : year, month - 1, day)) {
        return null;
    }
    return { year, month, day };
}

export function dateFromStat(stat: Pick<FileStat, 'mtime' | 'birthtime'>): CalendarDate {
    const timestamp = stat.birthtime ?? stat.mtime;
    return {
        year: timestamp.getFullYear(),
        month: timestamp.getMonth() + 1,
        day: timestamp.getDate(),
    };
}

/** Filename date first, filesystem timestamps only when the name has none. */
export function resolveDate(filename: string, stat: Pick<FileStat, 'mtime' | 'birthtime'>): CalendarDate {
    return dateFromFilename(filename) ?? dateFromStat(stat);
}
