/**
 * CSV read benchmark
 *
 * Measures full reads, reads with explicit dtypes (no inference scan) and
 * segmented reads against a plain line split of the same synthetic input.
 */

import { bench, group, run } from "mitata";
import { readCsvFromString, readCsvSegmented } from "../src/index.ts";

const ROWS = 200_000;
const CITIES = ["Lisbon", "Porto", "Faro", "Braga", "Coimbra"];

function syntheticCsv(rows: number): Uint8Array {
	const lines = ["id,city,price,qty,active,listed"];
	for (let i = 0; i < rows; i++) {
		const city = CITIES[i % CITIES.length] ?? "";
		const day = String((i % 28) + 1).padStart(2, "0");
		lines.push(
			`${i},${city},${(i * 0.37).toFixed(2)},${i % 97},${i % 3 === 0 ? "True" : "False"},2024-02-${day}`,
		);
	}
	return new TextEncoder().encode(`${lines.join("\n")}\n`);
}

const input = syntheticCsv(ROWS);
const text = new TextDecoder().decode(input);

console.log(`\nCSV read benchmarks (${ROWS} rows, ${(input.length / 1e6).toFixed(1)} MB)\n`);

group("full read", () => {
	bench("split lines", () => text.split("\n").length);

	bench("readCsvFromString (inferred)", () => {
		const result = readCsvFromString(input);
		return result.ok ? result.data.rowCount : 0;
	});

	bench("readCsvFromString (explicit dtypes)", () => {
		const result = readCsvFromString(input, {
			dtypes: {
				id: "int64",
				city: "category",
				price: "float64",
				qty: "int32",
				active: "bool",
				listed: "date",
			},
		});
		return result.ok ? result.data.rowCount : 0;
	});
});

group("segmented read", () => {
	bench("1 MB segments", async () => {
		const result = await readCsvSegmented(input, 1 << 20);
		return result.ok ? result.data.rowCount : 0;
	});
});

await run();
