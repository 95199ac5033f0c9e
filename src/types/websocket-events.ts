import { CLUM_EVENT_NAMES } from "./clum.js";

export const WS_EVENT_NAMES = {
  ...CLUM_EVENT_NAMES,
  SUBSCRIBE: "SUBSCRIBE",
  UNSUBSCRIBE: "UNSUBSCRIBE",
  PING: "PING",
  PONG: "PONG",
  ERROR: "ERROR",
} as const;

export type WsEventName = (typeof WS_EVENT_NAMES)[keyof typeof WS_EVENT_NAMES];

/** Amounts on the wire are decimal strings (WAD values with up to 18 decimals). */
export interface GridRecenteredWsPayload {
  oldCenter: string;
  newCenter: string;
}

export interface TradeExecutedWsPayload {
  type: "CALL" | "PUT";
  strike: string;
  size: string;
  side: "BUY" | "SELL";
  cost: string;
  cachedCost: string;
  executedAt: string;
}

export interface CostUpdatedWsPayload {
  oldCost: string;
  newCost: string;
}

export interface SubscribePayload {
  room: string;
}

export interface UnsubscribePayload {
  room: string;
}

export interface WsErrorPayload {
  code: string;
  message: string;
}

export type WsEventPayloadMap = {
  [WS_EVENT_NAMES.GRID_RECENTERED]: GridRecenteredWsPayload;
  [WS_EVENT_NAMES.TRADE_EXECUTED]: TradeExecutedWsPayload;
  [WS_EVENT_NAMES.COST_UPDATED]: CostUpdatedWsPayload;
  [WS_EVENT_NAMES.SUBSCRIBE]: SubscribePayload;
  [WS_EVENT_NAMES.UNSUBSCRIBE]: UnsubscribePayload;
  [WS_EVENT_NAMES.PING]: undefined;
  [WS_EVENT_NAMES.PONG]: undefined;
  [WS_EVENT_NAMES.ERROR]: WsErrorPayload;
};

export interface WsMessage<E extends WsEventName = WsEventName> {
  type: E;
  payload: WsEventPayloadMap[E];
  requestId?: string;
}

/** One of the three engine events, as sent to clients. */
export type ClumWsMessage = {
  [K in (typeof CLUM_EVENT_NAMES)[keyof typeof CLUM_EVENT_NAMES]]: WsMessage<K>;
}[(typeof CLUM_EVENT_NAMES)[keyof typeof CLUM_EVENT_NAMES]];
