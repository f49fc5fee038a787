export {
  ChatTurnRequestSchema,
  MAX_ENCRYPTED_MESSAGE_CHARS,
  parseChatTurnRequest,
  toChatTurnResponse,
  toHistoryEntry,
  type ChatTurnRequest,
  type ChatTurnRequestWire,
  type ChatTurnResponse,
  type HistoryEntry,
} from "./schemas.js";
