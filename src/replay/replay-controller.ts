/**
 * Replay Controller
 * Drives an embedded client application through the replay of one recorded
 * tracking session.
 *
 * STATES:
 * -------
 *
 * ```
 * uninitialized ──embed_loaded──► awaiting_config ──init──► idle
 *                                                            │ play
 *                                                            ▼
 *                                          paused ◄──pause── playing
 *                                            └──────play──────►
 *
 * idle / playing / paused ──stop | replay_stopped──► stopped
 * ```
 *
 * `stopped` is terminal: the embed is reloaded in live mode after
 * `REPLAY.RELOAD_DELAY_MS`.
 *
 * Data is pulled by the embedded application (`pulldata`), one chunk per
 * request, so the controller never sends faster than the embed consumes.
 *
 * Every inbound message must come from the allowed origin. Anything else is
 * dropped before it is parsed: no transition, no reply.
 */

import { REPLAY } from "../config/constants.js";
import type { ReplayChunkResponse, ReplaySessionInfo } from "../services/replay-data.service.js";
import {
  inboundReplayMessageSchema,
  type OutboundReplayMessage,
  type ReplayMessageEvent,
  type ReplayState,
  type ReplayTrigger,
} from "./replay.types.js";

// ============================================
// Transition Table
// ============================================

const REPLAY_TRANSITIONS: Record<ReplayState, Partial<Record<ReplayTrigger, ReplayState>>> = {
  uninitialized: {
    embed_loaded: "awaiting_config",
  },
  awaiting_config: {
    init: "idle",
  },
  idle: {
    play: "playing",
    stop: "stopped",
    replay_stopped: "stopped",
  },
  playing: {
    pause: "paused",
    stop: "stopped",
    replay_stopped: "stopped",
  },
  paused: {
    play: "playing",
    stop: "stopped",
    replay_stopped: "stopped",
  },
  stopped: {}, // Terminal state
};

/** States in which the embed may pull data and receive speed changes */
const ACTIVE_STATES: ReadonlySet<ReplayState> = new Set(["idle", "playing", "paused"]);

export function nextReplayState(state: ReplayState, trigger: ReplayTrigger): ReplayState | null {
  return REPLAY_TRANSITIONS[state][trigger] ?? null;
}

// ============================================
// Collaborators
// ============================================

export interface ReplayPort {
  /** Deliver a message to the embedded application */
  post(message: OutboundReplayMessage, targetOrigin: string): void;
  /** Load the embedded application at `url` */
  reload(url: string): void;
}

export interface ReplayChunkSource {
  getChunk(i: number): Promise<ReplayChunkResponse>;
}

export interface ReplayControllerOptions {
  session: Pick<ReplaySessionInfo, "app_config" | "allowed_origin" | "session_url" | "n_chunks">;
  chunks: ReplayChunkSource;
  port: ReplayPort;
  schedule?: (callback: () => void, delayMs: number) => void;
  onStateChange?: (state: ReplayState, previous: ReplayState) => void;
}

// ============================================
// Controller
// ============================================

export class ReplayController {
  private current: ReplayState = "uninitialized";
  private readonly schedule: (callback: () => void, delayMs: number) => void;

  constructor(private readonly options: ReplayControllerOptions) {
    this.schedule = options.schedule ?? ((callback, delayMs) => setTimeout(callback, delayMs));
  }

  get state(): ReplayState {
    return this.current;
  }

  /** Whether playback is active (drives the play/pause toggle) */
  get isPlaying(): boolean {
    return this.current === "playing";
  }

  // ─────────────────────────────────────────
  // Controlling surface
  // ─────────────────────────────────────────

  /** The embed started loading the session URL in replay mode */
  embedLoaded(): boolean {
    return this.transition("embed_loaded");
  }

  play(): boolean {
    return this.command("play", { msgtype: "replay_ctrl_play", data: null });
  }

  pause(): boolean {
    return this.command("pause", { msgtype: "replay_ctrl_pause", data: null });
  }

  stop(): boolean {
    if (!this.command("stop", { msgtype: "replay_ctrl_stop", data: null })) return false;
    this.scheduleLiveReload();
    return true;
  }

  setReplaySpeed(speed: number): boolean {
    if (!ACTIVE_STATES.has(this.current) || !(speed > 0)) return false;
    this.post({ msgtype: "set_replay_speed", data: { speed } });
    return true;
  }

  // ─────────────────────────────────────────
  // Embedded application
  // ─────────────────────────────────────────

  /**
   * Handle a message received from the embed.
   *
   * @returns true if the message was acted upon
   */
  async handleMessage(event: ReplayMessageEvent): Promise<boolean> {
    if (event.origin !== this.options.session.allowed_origin) {
      console.warn(`[Replay] Ignored message from foreign origin ${event.origin}`);
      return false;
    }

    const parsed = inboundReplayMessageSchema.safeParse(event.data);
    if (!parsed.success) {
      console.warn("[Replay] Ignored unrecognized message");
      return false;
    }

    const message = parsed.data;
    switch (message.msgtype) {
      case "init":
        if (!this.transition("init")) return false;
        this.post({ msgtype: "app_config", data: this.options.session.app_config });
        return true;

      case "pulldata":
        return this.pullData(message.data.i);

      case "replay_stopped":
        if (!this.transition("replay_stopped")) return false;
        this.scheduleLiveReload();
        return true;
    }
  }

  private async pullData(i: number): Promise<boolean> {
    if (!ACTIVE_STATES.has(this.current)) return false;

    if (i >= this.options.session.n_chunks) {
      return this.finish();
    }

    let response: ReplayChunkResponse;
    try {
      response = await this.options.chunks.getChunk(i);
    } catch (error) {
      console.error(`[Replay] Failed to load chunk ${i}:`, error);
      return false;
    }

    // stopped while the chunk was loading
    if (!ACTIVE_STATES.has(this.current)) return false;

    if ("done" in response) {
      return this.finish();
    }

    this.post({ msgtype: "replaydata", data: { ...response.replaydata, i } });
    return true;
  }

  /** Past the last chunk: tell the embed and stop */
  private finish(): boolean {
    this.post({ msgtype: "replay_stopped", data: null });
    this.transition("replay_stopped");
    this.scheduleLiveReload();
    return true;
  }

  // ─────────────────────────────────────────
  // Internals
  // ─────────────────────────────────────────

  private command(trigger: ReplayTrigger, message: OutboundReplayMessage): boolean {
    if (!this.transition(trigger)) return false;
    this.post(message);
    return true;
  }

  private transition(trigger: ReplayTrigger): boolean {
    const previous = this.current;
    const next = nextReplayState(previous, trigger);
    if (!next) {
      console.warn(`[Replay] Invalid transition: ${previous} + ${trigger}`);
      return false;
    }
    this.current = next;
    this.options.onStateChange?.(next, previous);
    return true;
  }

  private post(message: OutboundReplayMessage): void {
    this.options.port.post(message, this.options.session.allowed_origin);
  }

  private scheduleLiveReload(): void {
    this.schedule(() => {
      console.log("[Replay] Reloading application in live mode");
      this.options.port.reload(this.options.session.session_url);
    }, REPLAY.RELOAD_DELAY_MS);
  }
}
