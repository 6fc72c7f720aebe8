/**
 * Byte sources for CSV reads.
 *
 * A source is a local file path, an in-memory buffer, or an (already
 * decompressed) stream of chunks. Every source is read to a single buffer
 * before tokenizing.
 */

import { readFile, stat } from "node:fs/promises";
import { InputNotFoundError } from "../errors/input-not-found.ts";

export type CsvSource = string | Uint8Array | AsyncIterable<Uint8Array | string>;

/** Load the source's bytes. Throws InputNotFoundError for missing paths. */
export async function loadSource(source: CsvSource): Promise<Uint8Array> {
	if (typeof source === "string") return readPath(source);
	if (source instanceof Uint8Array) return source;
	return collectStream(source);
}

async function readPath(path: string): Promise<Uint8Array> {
	let isFile: boolean;
	try {
		isFile = (await stat(path)).isFile();
	} catch (e) {
		if (isMissingPathError(e)) {
			throw new InputNotFoundError(path, "no such file");
		}
		throw e;
	}
	if (!isFile) {
		throw new InputNotFoundError(path, "not a regular file");
	}
	return readFile(path);
}

function isMissingPathError(e: unknown): boolean {
	return (
		e instanceof Error &&
		"code" in e &&
		(e.code === "ENOENT" || e.code === "ENOTDIR")
	);
}

async function collectStream(
	stream: AsyncIterable<Uint8Array | string>,
): Promise<Uint8Array> {
	const chunks: Buffer[] = [];
	for await (const chunk of stream) {
		chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : Buffer.from(chunk));
	}
	return Buffer.concat(chunks);
}
