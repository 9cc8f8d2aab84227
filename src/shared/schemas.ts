import { z } from "zod";
import { BRIDGE_ACTIONS, type BridgeAction } from "./contracts";

const entityValueSchema = z.union([z.string(), z.number(), z.boolean()]);

const requestIdSchema = z.union([z.string().max(120), z.number()]).optional();

export const permissionProfileSchema = z.record(z.string().min(1).max(80), z.boolean());

export const speedSchema = z.number().finite();

export const pluginManifestSchema = z.object({
  id: z.string().min(2).max(64),
  name: z.string().min(2).max(80),
  version: z.string().min(1).max(20),
  description: z.string().min(1).max(300),
  entry: z.string().min(1).max(180),
  tools: z.array(z.string().regex(/^[a-z][a-z0-9_]{1,63}$/)).min(1).max(32)
});

/** Shape the fallback model is asked to reply with. */
export const llmIntentReplySchema = z.object({
  intent: z.string().trim().min(1).max(64),
  entities: z.record(z.string(), entityValueSchema.nullable()).default({}),
  confidence: z.number().finite().default(0)
});

export const bridgeEnvelopeSchema = z
  .object({
    action: z.string().min(1).max(64),
    request_id: requestIdSchema
  })
  .passthrough();

export const bridgeRequestSchema = z.discriminatedUnion("action", [
  z.object({
    action: z.literal("process_input"),
    text: z.string().max(2_000),
    source: z.enum(["text", "voice"]).default("text"),
    request_id: requestIdSchema
  }),
  z.object({
    action: z.literal("capture_voice_input"),
    prompt: z.string().trim().max(200).optional(),
    request_id: requestIdSchema
  }),
  z.object({
    action: z.literal("update_preferences"),
    speed: speedSchema.optional(),
    permission_profile: permissionProfileSchema.optional(),
    request_id: requestIdSchema
  }),
  z.object({ action: z.literal("get_state"), request_id: requestIdSchema }),
  z.object({ action: z.literal("kill"), request_id: requestIdSchema }),
  z.object({ action: z.literal("reset_kill_switch"), request_id: requestIdSchema }),
  z.object({ action: z.literal("shutdown"), request_id: requestIdSchema })
]);

export type BridgeRequest = z.infer<typeof bridgeRequestSchema>;

export const isBridgeAction = (value: string): value is BridgeAction =>
  BRIDGE_ACTIONS.some((action) => action === value);
