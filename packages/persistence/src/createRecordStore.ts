import type { ModuleLogger, RecordStore } from "@cryptota/core";
import { JsonlFileRecordStore } from "./jsonlFileRecordStore";
import { MemoryRecordStore } from "./memoryRecordStore";

export type PersistenceOptions =
	| { driver: "memory" }
	| { driver: "file"; filePath: string; logger?: ModuleLogger };

export const createRecordStore = (options: PersistenceOptions): RecordStore =>
	options.driver === "file"
		? new JsonlFileRecordStore({
				filePath: options.filePath,
				logger: options.logger,
			})
		: new MemoryRecordStore();
