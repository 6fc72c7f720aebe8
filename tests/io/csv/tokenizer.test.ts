import { describe, expect, test } from "vitest";
import { MalformedQuotingError } from "../../../src/errors/index.ts";
import { BYTES } from "../../../src/io/csv/options.ts";
import { type Dialect, RowKind, Tokenizer } from "../../../src/io/csv/tokenizer.ts";

const encoder = new TextEncoder();

const COMMA: Dialect = {
	delimiter: BYTES.COMMA,
	quote: BYTES.QUOTE,
	quoting: true,
	comment: null,
};

function tokenize(text: string, dialect: Dialect = COMMA): string[][] {
	const tokenizer = new Tokenizer(encoder.encode(text), dialect);
	return [...tokenizer.rows()].map((row) => tokenizer.decodeRow(row));
}

describe("Tokenizer", () => {
	test("splits rows and fields", () => {
		expect(tokenize("a,b\n1,2\n")).toEqual([
			["a", "b"],
			["1", "2"],
		]);
	});

	test("reports row offsets", () => {
		const tokenizer = new Tokenizer(encoder.encode("a,b\n1,2"), COMMA);
		const rows = [...tokenizer.rows()];
		expect(rows.map((r) => [r.start, r.end])).toEqual([
			[0, 4],
			[4, 7],
		]);
	});

	test("strips CR before LF", () => {
		expect(tokenize("a,b\r\n1,2\r\n")).toEqual([
			["a", "b"],
			["1", "2"],
		]);
	});

	test("keeps delimiters and newlines inside quotes", () => {
		expect(tokenize('"x,y",z\n"a\nb",c\n')).toEqual([
			["x,y", "z"],
			["a\nb", "c"],
		]);
	});

	test("unescapes doubled quotes", () => {
		expect(tokenize('"he said ""hi""",2\n')).toEqual([['he said "hi"', "2"]]);
	});

	test("toggles quoting in the middle of a field", () => {
		expect(tokenize('ab"c,d"e,f\n')).toEqual([['ab"c,d"e', "f"]]);
	});

	test("strips quotes around padded fields", () => {
		expect(tokenize('"1,one," , ",2,two" ,3\n')).toEqual([["1,one,", ",2,two", "3"]]);
	});

	test("treats quotes as data when quoting is off", () => {
		expect(tokenize('"a,b"\n', { ...COMMA, quoting: false })).toEqual([['"a', 'b"']]);
	});

	test("trims spaces around fields", () => {
		expect(tokenize(' x , "y" \n')).toEqual([["x", "y"]]);
	});

	test("classifies blank and comment rows", () => {
		const tokenizer = new Tokenizer(encoder.encode("# note\na\n\n  \nb\n"), {
			...COMMA,
			comment: BYTES.HASH,
		});
		const kinds = [...tokenizer.rows()].map((r) => r.kind);
		expect(kinds).toEqual([
			RowKind.Comment,
			RowKind.Data,
			RowKind.Blank,
			RowKind.Blank,
			RowKind.Data,
		]);
	});

	test("blank rows hold one empty field", () => {
		expect(tokenize("\n")).toEqual([[""]]);
	});

	test("keeps empty fields", () => {
		expect(tokenize(",a,\n")).toEqual([["", "a", ""]]);
	});

	test("rejects an unterminated quote", () => {
		const tokenizer = new Tokenizer(encoder.encode('a,b\n1,"2\n'), COMMA);
		const rows = tokenizer.rows();
		expect(rows.next().done).toBe(false);
		try {
			rows.next();
			expect.unreachable();
		} catch (e) {
			expect(e).toBeInstanceOf(MalformedQuotingError);
			if (e instanceof MalformedQuotingError) expect(e.byteOffset).toBe(4);
		}
	});

	test("splits on whitespace runs", () => {
		const dialect = { ...COMMA, delimiter: null };
		expect(tokenize("  a   b\tc\r\n1 2 3\n", dialect)).toEqual([
			["a", "b", "c"],
			["1", "2", "3"],
		]);
		expect(tokenize('"x y" z\n', dialect)).toEqual([["x y", "z"]]);
	});

	test("reads only rows starting inside the window", () => {
		const bytes = encoder.encode("a,b\n1,2\n3,4\n");
		const tokenizer = new Tokenizer(bytes, COMMA, { start: 4, stop: 8 });
		expect([...tokenizer.rows()].map((r) => tokenizer.decodeRow(r))).toEqual([["1", "2"]]);
	});

	test("rows() restarts from the window start", () => {
		const tokenizer = new Tokenizer(encoder.encode("a\nb\n"), COMMA);
		expect([...tokenizer.rows()]).toHaveLength(2);
		expect([...tokenizer.rows()]).toHaveLength(2);
	});

	test("decodes multi-byte text", () => {
		expect(tokenize("héllo,wörld\n")).toEqual([["héllo", "wörld"]]);
	});
});
