/*
 * Copyright 2025 The Carpocratian Church of Commonality and Equality, Inc.
 *
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *      http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */

/**
 * Arcade Environment Server
 *
 * Hosts one ArcadeEnv and exposes it via WebSocket, so learners running
 * outside Node can drive the emulator.
 *
 * Protocol: JSON messages with { cmd, ...args } structure.
 *
 * Usage:
 *   arcade-rl bridge --wasm ./pkg/arcade.js --rom-dir ./roms --port 9999
 *
 * Or programmatically:
 *   const server = new EnvServer({ core, preset: "arcade-v0-small" });
 *   await server.start();
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import { WebSocketServer, type RawData, type WebSocket } from "ws";
import { ArcadeEnv } from "../env/ArcadeEnv.js";
import { presetConfig, type ArcadeEnvConfig, type PresetName } from "../env/config.js";
import type { EmulatorCore } from "../emulator/Emulator.js";
import { loadEmulatorWasm, type DipSwitches } from "../emulator/EmulatorWasm.js";
import { handleCommand, parseCommand, toErrorResponse } from "./commands.js";
import type { Response } from "./protocol.js";

// ============================================================================
// Configuration
// ============================================================================

export interface EnvServerOptions {
  /** Port to listen on (default: 9999, 0 picks a free port) */
  port?: number;
  /** Host to bind to (default: 0.0.0.0) */
  host?: string;
  /** Preset to build the environment from (default: arcade-v0) */
  preset?: PresetName;
  /** Overrides applied on top of the preset */
  envOptions?: ArcadeEnvConfig;
  /** Emulator core to host; takes precedence over wasmModule */
  core?: EmulatorCore;
  /** wasm-bindgen package exporting ArcadeMachine */
  wasmModule?: string;
  /** ROM directory for wasmModule (default: ./roms) */
  romDir?: string;
  dipSwitches?: DipSwitches;
  /** Enable verbose logging */
  verbose?: boolean;
  /** API token for authentication (also reads ARCADE_RL_API_KEY env var) */
  apiToken?: string;
  /** Max concurrent connections (default: 10, 0 = unlimited) */
  maxConnections?: number;
}

interface ResolvedOptions {
  port: number;
  host: string;
  preset: PresetName;
  envOptions: ArcadeEnvConfig;
  verbose: boolean;
  apiToken: string | null;
  maxConnections: number;
}

// ============================================================================
// EnvServer Class
// ============================================================================

export class EnvServer {
  private httpServer: Server | null = null;
  private wss: WebSocketServer | null = null;
  private env: ArcadeEnv | null = null;
  private options: ResolvedOptions;
  private source: Pick<EnvServerOptions, "core" | "wasmModule" | "romDir" | "dipSwitches">;
  private clientCount = 0;
  private clientIds: Map<WebSocket, string> = new Map();
  private startTime: number = Date.now();

  constructor(options: EnvServerOptions = {}) {
    // API token from option or environment variable
    const apiToken = options.apiToken ?? process.env.ARCADE_RL_API_KEY ?? null;

    this.options = {
      port: options.port ?? 9999,
      host: options.host ?? "0.0.0.0",
      preset: options.preset ?? "arcade-v0",
      envOptions: options.envOptions ?? {},
      verbose: options.verbose ?? false,
      apiToken,
      maxConnections: options.maxConnections ?? 10,
    };

    this.source = {
      core: options.core,
      wasmModule: options.wasmModule,
      romDir: options.romDir,
      dipSwitches: options.dipSwitches,
    };
  }

  /** Bound port once listening (resolves port 0). */
  get port(): number {
    const address = this.httpServer?.address();
    return address && typeof address === "object" ? address.port : this.options.port;
  }

  get environment(): ArcadeEnv | null {
    return this.env;
  }

  /**
   * Build the environment, then start the WebSocket server with HTTP health endpoint.
   */
  async start(): Promise<void> {
    this.startTime = Date.now();

    const core = await this.createCore();
    const env = new ArcadeEnv(core, presetConfig(this.options.preset, this.options.envOptions));
    this.env = env;

    // Create HTTP server with health check endpoint
    const httpServer = createServer((req, res) => this.handleHttpRequest(req, res));
    this.httpServer = httpServer;

    // Attach WebSocket server to HTTP server
    const wss = new WebSocketServer({ server: httpServer });
    this.wss = wss;

    wss.on("connection", (ws, req) => this.handleConnection(ws, req));

    wss.on("error", (error) => {
      console.error("[EnvServer] Server error:", error);
    });

    try {
      await new Promise<void>((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(this.options.port, this.options.host, () => {
          httpServer.off("error", reject);
          resolve();
        });
      });
    } catch (error) {
      console.error(`[EnvServer] Failed to listen on ${this.options.host}:${this.options.port}`);
      env.close();
      this.env = null;
      wss.close();
      this.wss = null;
      this.httpServer = null;
      throw error;
    }

    console.log(`🎮 Arcade EnvServer running on ws://${this.options.host}:${this.port}`);
    console.log(`   Preset: ${this.options.preset}`);
    console.log(`   Options: ${JSON.stringify(this.options.envOptions)}`);
    console.log(`   Health check: http://${this.options.host}:${this.port}/health`);
    if (this.options.apiToken) {
      console.log(`   Auth: API token required (use ?token=... in URL)`);
    }
    if (this.options.maxConnections > 0) {
      console.log(`   Max connections: ${this.options.maxConnections}`);
    }
  }

  /**
   * Stop the server and release the emulator.
   */
  async stop(): Promise<void> {
    if (this.options.verbose) {
      console.log("[EnvServer] Shutting down...");
    }

    this.env?.close();
    for (const ws of this.clientIds.keys()) {
      ws.terminate();
    }

    const wss = this.wss;
    const httpServer = this.httpServer;
    this.wss = null;
    this.httpServer = null;
    this.env = null;
    this.clientIds.clear();

    if (wss) {
      await new Promise<void>((resolve) => wss.close(() => resolve()));
    }
    if (httpServer) {
      await new Promise<void>((resolve, reject) =>
        httpServer.close((error) => (error ? reject(error) : resolve()))
      );
    }

    console.log("[EnvServer] Server stopped.");
  }

  /**
   * Handle HTTP requests (health check endpoint).
   */
  private handleHttpRequest(req: IncomingMessage, res: ServerResponse): void {
    if (req.url === "/health" || req.url === "/health/") {
      const health = {
        status: "healthy",
        uptime: Math.floor((Date.now() - this.startTime) / 1000),
        preset: this.options.preset,
        connections: this.clientIds.size,
        episodes: this.env?.episodeCount ?? 0,
      };

      res.writeHead(200, { "Content-Type": "application/json" });
      res.end(JSON.stringify(health));
      return;
    }

    if (req.url === "/ready" || req.url === "/ready/") {
      // Readiness check - is the environment open?
      const ready = this.env !== null && this.env.phase !== "closed";
      res.writeHead(ready ? 200 : 503, { "Content-Type": "application/json" });
      res.end(JSON.stringify({ ready }));
      return;
    }

    // For any other HTTP request, return 426 Upgrade Required
    res.writeHead(426, { "Content-Type": "text/plain" });
    res.end("WebSocket connection required. Use ws:// protocol.");
  }

  private async createCore(): Promise<EmulatorCore> {
    const { core, wasmModule, romDir, dipSwitches } = this.source;
    if (core) return core;
    if (!wasmModule) {
      throw new Error("EnvServer needs either an emulator core or a wasmModule path");
    }
    return loadEmulatorWasm(wasmModule, { romDir: romDir ?? "roms", dipSwitches });
  }

  /**
   * Handle a new WebSocket connection.
   */
  private handleConnection(ws: WebSocket, req: IncomingMessage): void {
    const addr = req.socket.remoteAddress;

    // Check connection limit
    if (this.options.maxConnections > 0 && this.clientIds.size >= this.options.maxConnections) {
      console.warn(`[EnvServer] Connection limit reached (${this.options.maxConnections}), rejecting ${addr}`);
      ws.close(1013, "Max connections reached");
      return;
    }

    // Check API token if configured
    if (this.options.apiToken) {
      const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
      const providedToken = url.searchParams.get("token") ?? req.headers["x-api-token"];

      if (providedToken !== this.options.apiToken) {
        console.warn(`[EnvServer] Invalid or missing API token from ${addr}`);
        ws.close(4001, "Unauthorized: Invalid API token");
        return;
      }
    }

    this.clientCount++;
    const clientId = `client-${this.clientCount}`;
    this.clientIds.set(ws, clientId);

    if (this.options.verbose) {
      console.log(`[EnvServer] ${clientId} connected from ${addr}`);
    }

    ws.on("message", (data) => {
      ws.send(JSON.stringify(this.respond(clientId, data)));
    });

    ws.on("close", () => {
      this.clientIds.delete(ws);

      if (this.options.verbose) {
        console.log(`[EnvServer] ${clientId} disconnected`);
      }
    });

    ws.on("error", (error) => {
      console.error(`[EnvServer] ${clientId} WebSocket error:`, error);
    });
  }

  /**
   * Decode, run and answer one message. Never throws.
   */
  private respond(clientId: string, data: RawData): Response {
    try {
      if (!this.env) {
        throw new Error("Environment not initialized");
      }

      const cmd = parseCommand(data.toString());

      if (this.options.verbose) {
        console.log(`[EnvServer] ${clientId} -> ${JSON.stringify(cmd)}`);
      }

      const response = handleCommand(this.env, cmd, this.options.preset);

      if (this.options.verbose) {
        const text = JSON.stringify(response);
        console.log(`[EnvServer] ${clientId} <- ${text.slice(0, 200)}${text.length > 200 ? "..." : ""}`);
      }

      return response;
    } catch (error) {
      const response = toErrorResponse(error);
      console.error(`[EnvServer] ${clientId} ${response.type}:`, response.error);
      return response;
    }
  }
}
