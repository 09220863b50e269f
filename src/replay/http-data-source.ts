/**
 * Replay HTTP Data Source
 * Fetches replay session info and chunks from the admin replay endpoints.
 *
 * @example
 * const source = new ReplayHttpClient({ baseUrl: "https://tracklab.example.org/api/v1", adminKey });
 * const session = await source.getSession(42);
 * const controller = new ReplayController({ session, chunks: source.chunksFor(42), port });
 */

import axios, { AxiosError, type AxiosInstance } from "axios";
import type { ReplayChunkResponse, ReplaySessionInfo } from "../services/replay-data.service.js";
import type { ReplayChunkSource } from "./replay-controller.js";

export class ReplayApiError extends Error {
  constructor(
    message: string,
    public readonly status: number | null
  ) {
    super(message);
    this.name = "ReplayApiError";
  }
}

export interface ReplayHttpClientOptions {
  baseUrl: string;
  adminKey: string;
  /** Pre-configured axios instance (custom adapters, interceptors) */
  http?: AxiosInstance;
}

export class ReplayHttpClient {
  private readonly http: AxiosInstance;

  constructor(options: ReplayHttpClientOptions) {
    this.http =
      options.http ??
      axios.create({
        timeout: 15_000,
      });
    this.http.defaults.baseURL = options.baseUrl;
    this.http.defaults.headers.common["x-admin-key"] = options.adminKey;
  }

  async getSession(trackingSessionId: number): Promise<ReplaySessionInfo> {
    return this.get<ReplaySessionInfo>(`/admin/replay/${trackingSessionId}`);
  }

  async getChunk(trackingSessionId: number, i: number): Promise<ReplayChunkResponse> {
    return this.get<ReplayChunkResponse>(`/admin/replay/${trackingSessionId}/chunk/${i}`);
  }

  /** Chunk source bound to one tracking session, for the replay controller */
  chunksFor(trackingSessionId: number): ReplayChunkSource {
    return { getChunk: (i) => this.getChunk(trackingSessionId, i) };
  }

  private async get<T>(url: string): Promise<T> {
    try {
      const response = await this.http.get<T>(url);
      return response.data;
    } catch (error) {
      if (error instanceof AxiosError) {
        throw new ReplayApiError(`Replay API error: ${error.message}`, error.response?.status ?? null);
      }
      throw error;
    }
  }
}
