export { createTelegramDeliverer, classifyFailure, buildAudioForm, TelegramDeliveryError } from "./telegram";
export { sanitizeTitle, sanitizePerformer, buildCaption } from "./metadata";
export type { DeliverFn } from "./telegram";
