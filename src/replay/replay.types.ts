/**
 * Replay Message Vocabulary
 *
 * Messages travel as `{ msgtype, data }` over a postMessage channel between
 * the replay controller and the embedded client application.
 *
 * ```
 *   controller                         embedded application
 *       │  ◄──────────── init ───────────────  │
 *       │  ───────────── app_config ─────────► │
 *       │  ◄──────────── pulldata {i} ───────  │
 *       │  ───────────── replaydata ─────────► │
 *       │  ───── replay_ctrl_play/pause/stop ► │
 *       │  ───────────── set_replay_speed ───► │
 *       │  ◄──────────── replay_stopped ─────  │
 * ```
 */

import { z } from "zod";
import type { AppConfigJson } from "../types/session.types.js";
import type { ReplayChunk } from "../services/replay-data.service.js";

export type ReplayState = "uninitialized" | "awaiting_config" | "idle" | "playing" | "paused" | "stopped";

/** Everything that can move the controller between states */
export type ReplayTrigger = "embed_loaded" | "init" | "play" | "pause" | "stop" | "replay_stopped";

// ============================================
// Inbound (embedded application → controller)
// ============================================

export const inboundReplayMessageSchema = z.discriminatedUnion("msgtype", [
  z.object({ msgtype: z.literal("init"), data: z.unknown().optional() }),
  z.object({
    msgtype: z.literal("pulldata"),
    data: z.object({ i: z.number().int().nonnegative() }),
  }),
  z.object({ msgtype: z.literal("replay_stopped"), data: z.unknown().optional() }),
]);

export type InboundReplayMessage = z.infer<typeof inboundReplayMessageSchema>;

// ============================================
// Outbound (controller → embedded application)
// ============================================

export type OutboundReplayMessage =
  | { msgtype: "app_config"; data: AppConfigJson }
  | { msgtype: "replaydata"; data: ReplayChunk & { i: number } }
  | { msgtype: "replay_ctrl_play"; data: null }
  | { msgtype: "replay_ctrl_pause"; data: null }
  | { msgtype: "replay_ctrl_stop"; data: null }
  | { msgtype: "set_replay_speed"; data: { speed: number } }
  | { msgtype: "replay_stopped"; data: null };

/** A received message as the browser reports it */
export interface ReplayMessageEvent {
  origin: string;
  data: unknown;
}
