import { type } from "arktype";

export const ApiEnvelopeSchema = type({
  "code?": "number",
  "message?": "string",
  "data?": "unknown",
});

export const StartDataSchema = type({
  game_info: {
    game_id: "string",
  },
  websocket_info: {
    auth_body: "string",
    wss_link: "string[]",
  },
  anchor_info: {
    "room_id?": "number",
    "uname?": "string",
    "open_id?": "string",
  },
});

export const LiveMessageSchema = type({
  cmd: "string",
  "data?": "unknown",
});

export type ApiEnvelope = typeof ApiEnvelopeSchema.infer;
export type StartData = typeof StartDataSchema.infer;
