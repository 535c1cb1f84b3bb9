// Wire schemas for validating inbound messages.
//
// These mirror the presence rules of the message types: `method` on Emit and
// Deliver only, `id` required everywhere except Emit, `error` on Ack only.

import { z } from "zod";

import { MAX_CALL_ID, MIN_CALL_ID, MessageKind } from "./types.ts";

export const CallIdSchema = z.number().int().min(MIN_CALL_ID).max(MAX_CALL_ID);

export const EmitMessageSchema = z.object({
  kind: z.literal(MessageKind.Emit),
  id: CallIdSchema.optional(),
  method: z.string(),
  param: z.unknown().optional(),
});

export const DeliverMessageSchema = z.object({
  kind: z.literal(MessageKind.Deliver),
  id: CallIdSchema,
  method: z.string(),
  param: z.unknown().optional(),
});

export const NotifyMessageSchema = z.object({
  kind: z.literal(MessageKind.Notify),
  id: CallIdSchema,
  param: z.unknown().optional(),
});

export const AckMessageSchema = z.object({
  kind: z.literal(MessageKind.Ack),
  id: CallIdSchema,
  param: z.unknown().optional(),
  error: z.unknown().optional(),
});

export const CancelMessageSchema = z.object({
  kind: z.literal(MessageKind.Cancel),
  id: CallIdSchema,
});

/**
 * Schema for any protocol message, discriminated on `kind`.
 */
export const MessageSchema = z.discriminatedUnion("kind", [
  EmitMessageSchema,
  DeliverMessageSchema,
  NotifyMessageSchema,
  AckMessageSchema,
  CancelMessageSchema,
]);
