/**
 * Engine-wide defaults for CSV reads.
 */
export interface EngineConfig {
	/** Data rows scanned for column-count detection and dtype inference (default: all rows) */
	inferenceSampleRows: number;

	/** Data lines examined when sniffing the delimiter (default: 20) */
	sniffSampleRows: number;

	/** Starting capacity of column buffers, in values (default: 1024) */
	initialColumnCapacity: number;
}

/**
 * Default engine configuration.
 */
const DEFAULT_CONFIG: EngineConfig = {
	inferenceSampleRows: Number.POSITIVE_INFINITY,
	sniffSampleRows: 20,
	initialColumnCapacity: 1024,
};

/** Current global configuration */
let currentConfig: EngineConfig = { ...DEFAULT_CONFIG };

/**
 * Configure engine defaults.
 *
 * @example
 * ```ts
 * import { configure } from "kolumna";
 *
 * // Infer dtypes from the first 10k rows only
 * configure({ inferenceSampleRows: 10_000 });
 * ```
 */
export function configure(options: Partial<EngineConfig>): void {
	currentConfig = { ...currentConfig, ...options };
}

/**
 * Get current engine configuration.
 */
export function getConfig(): Readonly<EngineConfig> {
	return currentConfig;
}

/**
 * Reset configuration to defaults.
 */
export function resetConfig(): void {
	currentConfig = { ...DEFAULT_CONFIG };
}

/**
 * Get default configuration.
 */
export function getDefaultConfig(): Readonly<EngineConfig> {
	return DEFAULT_CONFIG;
}
