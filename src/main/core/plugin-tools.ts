import { existsSync, readdirSync, readFileSync } from "node:fs";
import { isAbsolute, join, relative, resolve } from "node:path";
import { Worker } from "node:worker_threads";
import type { ActionResult, IntentEntities, PluginManifest } from "../../shared/contracts";
import { pluginManifestSchema } from "../../shared/schemas";
import { Logger } from "./logger";

export type ToolHandler = (params: IntentEntities) => unknown;

export class PluginToolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PluginToolError";
  }
}

interface WorkerSuccess {
  ok: true;
  result: unknown;
}

interface WorkerFailure {
  ok: false;
  error: string;
}

type WorkerMessage = WorkerSuccess | WorkerFailure;

const TOOL_NAME_PATTERN = /^[a-z][a-z0-9_]{1,63}$/;

const WORKER_SCRIPT = `
const { parentPort, workerData } = require("node:worker_threads");
const Module = require("node:module");
const { pathToFileURL } = require("node:url");

const blockedModuleIds = new Set(["dns", "dgram", "http", "https", "net", "tls", "undici"]);
const normalizeRequest = (request) => String(request || "").replace(/^node:/, "").toLowerCase();
const originalLoad = Module._load;

if (workerData.offline) {
  Module._load = function patchedLoad(request, parent, isMain) {
    if (blockedModuleIds.has(normalizeRequest(request))) {
      throw new Error("Offline mode blocked module: " + request);
    }
    return originalLoad.call(this, request, parent, isMain);
  };

  globalThis.fetch = async () => {
    throw new Error("Offline mode blocked outbound network access.");
  };

  globalThis.WebSocket = class OfflineBlockedWebSocket {
    constructor() {
      throw new Error("Offline mode blocked outbound network access.");
    }
  };
}

const resolveTool = (loaded, name) => {
  const candidates = [loaded, loaded && loaded.default];
  for (const candidate of candidates) {
    if (!candidate || typeof candidate !== "object") {
      continue;
    }
    if (typeof candidate[name] === "function") {
      return candidate[name];
    }
    if (candidate.tools && typeof candidate.tools[name] === "function") {
      return candidate.tools[name];
    }
  }
  throw new Error("Plugin module does not export tool " + name + ".");
};

(async () => {
  const loaded = await import(pathToFileURL(workerData.entryPath).href);
  const tool = resolveTool(loaded, workerData.tool);
  const result = await Promise.resolve(tool(workerData.params));
  parentPort.postMessage({ ok: true, result });
})().catch((error) => {
  parentPort.postMessage({
    ok: false,
    error: error && error.message ? error.message : "Unknown plugin worker error."
  });
});
`;

const isRecord = (value: unknown): value is Record<string, unknown> => typeof value === "object" && value !== null;

const isWorkerMessage = (value: unknown): value is WorkerMessage =>
  isRecord(value) && typeof value.ok === "boolean" && (value.ok || typeof value.error === "string");

/** Normalizes whatever a tool returned into an ActionResult. */
export const toActionResult = (value: unknown, fallbackMessage = "Tool executed."): ActionResult => {
  if (value === undefined || value === null || value === "") {
    return { ok: true, message: fallbackMessage };
  }

  if (typeof value === "string") {
    return { ok: true, message: value };
  }

  if (!isRecord(value)) {
    return { ok: true, message: fallbackMessage, data: value };
  }

  if (typeof value.error === "string") {
    return { ok: false, message: value.error };
  }

  return {
    ok: typeof value.ok === "boolean" ? value.ok : true,
    message: typeof value.message === "string" ? value.message : fallbackMessage,
    data: "data" in value ? value.data : value
  };
};

const insideDirectory = (base: string, target: string): boolean => {
  const path = relative(base, target);
  return path.length > 0 && !path.startsWith("..") && !isAbsolute(path);
};

export interface PluginToolRegistryOptions {
  logger?: Logger;
  timeoutMs?: number;
  offline?: boolean;
}

/**
 * Named async tools reachable from `tool:<name>` plan steps. Tools are either registered
 * in-process or discovered from plugin directories and run in a worker thread per call.
 */
export class PluginToolRegistry {
  private readonly handlers = new Map<string, ToolHandler>();
  private readonly logger: Logger;
  private readonly timeoutMs: number;
  private readonly offline: boolean;

  constructor(options: PluginToolRegistryOptions = {}) {
    this.logger = options.logger ?? new Logger("plugins");
    this.timeoutMs = options.timeoutMs ?? 4000;
    this.offline = options.offline ?? false;
  }

  register(name: string, handler: ToolHandler): void {
    if (!TOOL_NAME_PATTERN.test(name)) {
      throw new PluginToolError(`Invalid tool name: ${name}`);
    }
    if (this.handlers.has(name)) {
      this.logger.warn(`Tool ${name} re-registered; the previous handler is replaced.`);
    }
    this.handlers.set(name, handler);
  }

  has(name: string): boolean {
    return this.handlers.has(name);
  }

  list(): string[] {
    return [...this.handlers.keys()].sort();
  }

  async call(name: string, params: IntentEntities): Promise<unknown> {
    const handler = this.handlers.get(name);
    if (!handler) {
      throw new PluginToolError(`Tool not available: ${name}`);
    }

    try {
      return await Promise.resolve(handler({ ...params }));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new PluginToolError(`Tool ${name} failed: ${reason}`);
    }
  }

  /** Reads `<dir>/<plugin>/manifest.json` files and registers each listed tool. */
  loadDirectory(pluginsDir: string): PluginManifest[] {
    if (!existsSync(pluginsDir)) {
      return [];
    }

    const loaded: PluginManifest[] = [];
    const dirs = readdirSync(pluginsDir, { withFileTypes: true }).filter((entry) => entry.isDirectory());

    for (const dir of dirs) {
      const pluginDir = join(pluginsDir, dir.name);
      const manifestPath = join(pluginDir, "manifest.json");
      if (!existsSync(manifestPath)) {
        continue;
      }

      try {
        const manifest = pluginManifestSchema.parse(JSON.parse(readFileSync(manifestPath, "utf8")));
        const entryPath = resolve(pluginDir, manifest.entry);
        if (!insideDirectory(resolve(pluginDir), entryPath)) {
          throw new PluginToolError("Plugin entry path escapes plugin directory.");
        }
        if (!existsSync(entryPath)) {
          throw new PluginToolError(`Plugin entry file not found: ${manifest.entry}`);
        }

        for (const tool of manifest.tools) {
          this.register(tool, (params) => this.runInWorker(entryPath, tool, params));
        }
        loaded.push(manifest);
        this.logger.info(`Plugin loaded: ${manifest.id}`, { tools: manifest.tools });
      } catch (error) {
        this.logger.warn(`Plugin skipped: ${dir.name}`, error instanceof Error ? error.message : error);
      }
    }

    return loaded;
  }

  private runInWorker(entryPath: string, tool: string, params: IntentEntities): Promise<unknown> {
    return new Promise<unknown>((resolvePromise, rejectPromise) => {
      const worker = new Worker(WORKER_SCRIPT, {
        eval: true,
        workerData: { entryPath, tool, params, offline: this.offline },
        env: {},
        resourceLimits: {
          maxOldGenerationSizeMb: 64
        }
      });

      let settled = false;
      const settle = (action: () => void): void => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timeout);
        action();
      };

      const timeout = setTimeout(() => {
        settle(() => rejectPromise(new Error("Plugin execution timed out.")));
        void worker.terminate();
      }, this.timeoutMs);

      worker.once("message", (message: unknown) => {
        if (!isWorkerMessage(message)) {
          settle(() => rejectPromise(new Error("Plugin worker sent an invalid response.")));
          return;
        }
        if (message.ok) {
          settle(() => resolvePromise(message.result));
          return;
        }
        settle(() => rejectPromise(new Error(message.error || "Plugin worker failed.")));
      });

      worker.once("error", (error) => {
        settle(() => rejectPromise(error));
      });

      worker.once("exit", (code) => {
        settle(() => rejectPromise(new Error(`Plugin worker exited with code ${code}.`)));
      });
    });
  }
}
