import { z } from "zod";
import { WS_EVENT_NAMES } from "../types/websocket-events.js";
import { CLUM_ROOM } from "../config/index.js";

const roomPayload = z.object({
  room: z.literal(CLUM_ROOM),
});

/** Messages a client may send. Engine events only flow server -> client. */
export const wsClientMessageSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal(WS_EVENT_NAMES.SUBSCRIBE),
    payload: roomPayload,
    requestId: z.string().optional(),
  }),
  z.object({
    type: z.literal(WS_EVENT_NAMES.UNSUBSCRIBE),
    payload: roomPayload,
    requestId: z.string().optional(),
  }),
  z.object({
    type: z.literal(WS_EVENT_NAMES.PING),
    payload: z.undefined().optional(),
    requestId: z.string().optional(),
  }),
  z.object({
    type: z.literal(WS_EVENT_NAMES.PONG),
    payload: z.undefined().optional(),
    requestId: z.string().optional(),
  }),
]);

export type WsClientMessage = z.infer<typeof wsClientMessageSchema>;
