import type {
	Candle,
	DepthBook,
	InstrumentId,
	Quote,
	TradeTick,
} from "../types";

export type PushEvent =
	| { instrument: InstrumentId; category: "quote"; payload: Quote }
	| { instrument: InstrumentId; category: "depth"; payload: DepthBook }
	| { instrument: InstrumentId; category: "trades"; payload: TradeTick[] }
	| {
			instrument: InstrumentId;
			category: "candle";
			payload: Candle;
			/** Bar interval the venue reported, e.g. "1m" */
			timeframe?: string;
	  };

/**
 * Turns one raw frame into zero or more typed events. Control frames
 * (subscription acks, heartbeats) decode to an empty list; malformed frames
 * throw DecodeError.
 */
export type FrameDecoder = (frame: string) => PushEvent[];
