/**
 * Locale-aware number text parsing.
 *
 * Text is validated and rewritten into plain JS number syntax (thousands
 * separators dropped, decimal separator replaced by ".") before conversion,
 * so values round-trip exactly.
 */

export interface NumberFormat {
	readonly decimal: string;
	readonly thousands: string | null;
}

export const DEFAULT_NUMBER_FORMAT: NumberFormat = { decimal: ".", thousands: null };

const INT32_MIN = -2147483648n;
const INT32_MAX = 2147483647n;
const INT64_MIN = -9223372036854775808n;
const INT64_MAX = 9223372036854775807n;

function isDigit(ch: string | undefined): boolean {
	return ch !== undefined && ch >= "0" && ch <= "9";
}

/**
 * Rewrite number text into JS syntax. Integer mode rejects a decimal part
 * and exponents. Returns undefined for text that is not a number.
 */
export function normalizeNumber(
	text: string,
	format: NumberFormat,
	integer: boolean,
): string | undefined {
	const len = text.length;
	let i = 0;
	let out = "";

	const sign = text[0];
	if (sign === "-" || sign === "+") {
		if (sign === "-") out = "-";
		i++;
	}

	let mantissaDigits = 0;
	while (i < len) {
		const ch = text[i];
		if (isDigit(ch)) {
			out += ch;
			mantissaDigits++;
			i++;
		} else if (
			ch === format.thousands &&
			isDigit(text[i - 1]) &&
			isDigit(text[i + 1])
		) {
			i++;
		} else {
			break;
		}
	}

	if (text[i] === format.decimal) {
		if (integer) return undefined;
		out += ".";
		i++;
		while (isDigit(text[i])) {
			out += text[i];
			mantissaDigits++;
			i++;
		}
	}

	if (mantissaDigits === 0) return undefined;

	if (text[i] === "e" || text[i] === "E") {
		if (integer) return undefined;
		out += "e";
		i++;
		const expSign = text[i];
		if (expSign === "-" || expSign === "+") {
			out += expSign;
			i++;
		}
		let expDigits = 0;
		while (isDigit(text[i])) {
			out += text[i];
			expDigits++;
			i++;
		}
		if (expDigits === 0) return undefined;
	}

	return i === len ? out : undefined;
}

const SPECIAL_FLOATS: ReadonlyMap<string, number> = new Map([
	["inf", Number.POSITIVE_INFINITY],
	["+inf", Number.POSITIVE_INFINITY],
	["-inf", Number.NEGATIVE_INFINITY],
	["infinity", Number.POSITIVE_INFINITY],
	["+infinity", Number.POSITIVE_INFINITY],
	["-infinity", Number.NEGATIVE_INFINITY],
	["nan", Number.NaN],
	["+nan", Number.NaN],
	["-nan", Number.NaN],
]);

/** Parse float text, including inf/infinity/nan in any case */
export function parseFloatText(
	text: string,
	format: NumberFormat = DEFAULT_NUMBER_FORMAT,
): number | undefined {
	const normalized = normalizeNumber(text, format, false);
	if (normalized !== undefined) return Number(normalized);
	return SPECIAL_FLOATS.get(text.toLowerCase());
}

/** Parse integer text within the signed 64-bit range */
export function parseInt64Text(
	text: string,
	format: NumberFormat = DEFAULT_NUMBER_FORMAT,
): bigint | undefined {
	const normalized = normalizeNumber(text, format, true);
	if (normalized === undefined) return undefined;
	const value = BigInt(normalized);
	return value < INT64_MIN || value > INT64_MAX ? undefined : value;
}

/** Parse integer text within the signed 32-bit range */
export function parseInt32Text(
	text: string,
	format: NumberFormat = DEFAULT_NUMBER_FORMAT,
): number | undefined {
	const normalized = normalizeNumber(text, format, true);
	if (normalized === undefined) return undefined;
	const value = BigInt(normalized);
	return value < INT32_MIN || value > INT32_MAX ? undefined : Number(value);
}
