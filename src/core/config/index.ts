export {
	configure,
	getConfig,
	getDefaultConfig,
	resetConfig,
} from "./config.ts";
export type { EngineConfig } from "./config.ts";
