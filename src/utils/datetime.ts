/**
 * Lenient date/time text parsing for Date columns.
 *
 * Accepted shapes (single-digit parts allowed):
 *   2024-01-31, 2024/1/31, 2024-01-31T08:15:00.250Z, 2024-01-31 08:15
 *   31/01/2024 or 01/31/2024 (see dayFirst), 14 / 07 / 1994, 30-04-2016
 *   2007-4-30 1:6:40.000PM
 * Result is UTC epoch milliseconds, or NaN when the text is not a date.
 */

const MS_PER_MINUTE = 60_000;

interface Cursor {
	readonly text: string;
	pos: number;
}

interface Digits {
	readonly value: number;
	readonly count: number;
}

export function parseDateTime(value: string, dayFirst = false): number {
	const cursor: Cursor = { text: value.trim(), pos: 0 };
	if (cursor.text.length === 0) return Number.NaN;

	const ymd = readDate(cursor, dayFirst);
	if (ymd === undefined) return Number.NaN;
	const [year, month, day] = ymd;

	let hour = 0;
	let minute = 0;
	let second = 0;
	let millis = 0;
	let offsetMinutes = 0;

	if (cursor.pos < cursor.text.length) {
		const sep = cursor.text[cursor.pos];
		if (sep !== "T" && sep !== "t" && sep !== " ") return Number.NaN;
		cursor.pos++;
		skipSpaces(cursor);

		const h = readDigits(cursor, 2);
		if (h === undefined || !consume(cursor, ":")) return Number.NaN;
		const m = readDigits(cursor, 2);
		if (m === undefined) return Number.NaN;
		hour = h.value;
		minute = m.value;

		if (consume(cursor, ":")) {
			const s = readDigits(cursor, 2);
			if (s === undefined) return Number.NaN;
			second = s.value;

			if (consume(cursor, ".")) {
				const frac = readDigits(cursor, Number.POSITIVE_INFINITY);
				if (frac === undefined) return Number.NaN;
				millis = fractionToMillis(cursor.text, cursor.pos - frac.count, frac.count);
			}
		}

		skipSpaces(cursor);
		const meridiem = readMeridiem(cursor);
		if (meridiem !== undefined) {
			if (hour < 1 || hour > 12) return Number.NaN;
			hour = (hour % 12) + (meridiem === "pm" ? 12 : 0);
		}

		skipSpaces(cursor);
		const offset = readOffset(cursor);
		if (offset === undefined) return Number.NaN;
		offsetMinutes = offset;
	}

	if (cursor.pos !== cursor.text.length) return Number.NaN;
	if (hour > 23 || minute > 59 || second > 59) return Number.NaN;

	return (
		utcEpoch(year, month, day, hour, minute, second, millis) -
		offsetMinutes * MS_PER_MINUTE
	);
}

/** Date.UTC without its mapping of years 0-99 onto 1900-1999 */
function utcEpoch(
	year: number,
	month: number,
	day: number,
	hour: number,
	minute: number,
	second: number,
	millis: number,
): number {
	const date = new Date(0);
	date.setUTCFullYear(year, month - 1, day);
	date.setUTCHours(hour, minute, second, millis);
	return date.getTime();
}

/** Read the date part as [year, month, day] */
function readDate(
	cursor: Cursor,
	dayFirst: boolean,
): [number, number, number] | undefined {
	const a = readDigits(cursor, 4);
	if (a === undefined) return undefined;

	skipSpaces(cursor);
	const sep = cursor.text[cursor.pos];
	if (sep !== "/" && sep !== "-" && sep !== ".") return undefined;
	cursor.pos++;
	skipSpaces(cursor);

	const b = readDigits(cursor, 2);
	if (b === undefined) return undefined;

	skipSpaces(cursor);
	if (!consume(cursor, sep)) return undefined;
	skipSpaces(cursor);

	const c = readDigits(cursor, 4);
	if (c === undefined) return undefined;

	if (a.count === 4) {
		if (c.count > 2) return undefined;
		return isValidDate(a.value, b.value, c.value)
			? [a.value, b.value, c.value]
			: undefined;
	}

	if (c.count !== 4) return undefined;
	const year = c.value;
	const [day, month] = dayFirst ? [a.value, b.value] : [b.value, a.value];
	if (isValidDate(year, month, day)) return [year, month, day];
	// Unambiguous input written in the other order
	if (isValidDate(year, day, month)) return [year, day, month];
	return undefined;
}

function readDigits(cursor: Cursor, maxCount: number): Digits | undefined {
	const { text } = cursor;
	let value = 0;
	let count = 0;
	while (cursor.pos < text.length && count < maxCount) {
		const code = text.charCodeAt(cursor.pos);
		if (code < 48 || code > 57) break;
		value = value * 10 + (code - 48);
		count++;
		cursor.pos++;
	}
	return count === 0 ? undefined : { value, count };
}

function fractionToMillis(text: string, start: number, count: number): number {
	const digits = text.slice(start, start + Math.min(count, 3)).padEnd(3, "0");
	return Number.parseInt(digits, 10);
}

function readMeridiem(cursor: Cursor): "am" | "pm" | undefined {
	const word = cursor.text.slice(cursor.pos, cursor.pos + 2).toLowerCase();
	if (word !== "am" && word !== "pm") return undefined;
	cursor.pos += 2;
	return word;
}

/** Offset in minutes east of UTC; 0 when absent, undefined when malformed */
function readOffset(cursor: Cursor): number | undefined {
	const ch = cursor.text[cursor.pos];
	if (ch === undefined) return 0;
	if (ch === "Z" || ch === "z") {
		cursor.pos++;
		return 0;
	}
	if (ch !== "+" && ch !== "-") return undefined;
	cursor.pos++;

	const start = cursor.pos;
	const hours = readDigits(cursor, 2);
	if (hours === undefined || cursor.pos - start !== 2) return undefined;
	consume(cursor, ":");
	const minutes = readDigits(cursor, 2);
	if (minutes === undefined || minutes.count !== 2 || minutes.value > 59) {
		return undefined;
	}
	const total = hours.value * 60 + minutes.value;
	return ch === "-" ? -total : total;
}

function consume(cursor: Cursor, ch: string): boolean {
	if (cursor.text[cursor.pos] !== ch) return false;
	cursor.pos++;
	return true;
}

function skipSpaces(cursor: Cursor): void {
	while (cursor.text[cursor.pos] === " ") cursor.pos++;
}

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

function isLeapYear(year: number): boolean {
	return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
	if (month === 2 && isLeapYear(year)) return 29;
	return DAYS_IN_MONTH[month - 1] ?? 0;
}

export function isValidDate(year: number, month: number, day: number): boolean {
	if (month < 1 || month > 12 || day < 1) return false;
	return day <= daysInMonth(year, month);
}
