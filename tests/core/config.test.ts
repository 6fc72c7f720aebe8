import { afterEach, describe, expect, test } from "vitest";
import {
	configure,
	getConfig,
	getDefaultConfig,
	resetConfig,
} from "../../src/core/config/config.ts";

describe("config", () => {
	afterEach(() => {
		resetConfig();
	});

	test("defaults", () => {
		expect(getConfig()).toEqual({
			inferenceSampleRows: Number.POSITIVE_INFINITY,
			sniffSampleRows: 20,
			initialColumnCapacity: 1024,
		});
	});

	test("configure merges partial settings", () => {
		configure({ sniffSampleRows: 5 });
		expect(getConfig().sniffSampleRows).toBe(5);
		expect(getConfig().initialColumnCapacity).toBe(1024);
	});

	test("resetConfig restores defaults", () => {
		configure({ initialColumnCapacity: 8 });
		resetConfig();
		expect(getConfig()).toEqual(getDefaultConfig());
	});
});
