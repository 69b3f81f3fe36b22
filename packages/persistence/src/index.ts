/**
 * Storage collaborators for assembled technical-analysis records.
 */
export {
	createRecordStore,
	type PersistenceOptions,
} from "./createRecordStore";
export {
	JsonlFileRecordStore,
	type JsonlFileRecordStoreOptions,
} from "./jsonlFileRecordStore";
export { DEFAULT_LATEST_LIMIT, MemoryRecordStore } from "./memoryRecordStore";
export {
	fromStorageRow,
	isStorageRow,
	selectLatest,
	toStorageRow,
	type StorageRow,
} from "./storageRow";
