export type {
	IndicatorParams,
	IndicatorPayload,
	IndicatorSource,
} from "./IndicatorSource";
export type { PriceSource } from "./PriceSource";
export type { RecordStore } from "./RecordStore";
