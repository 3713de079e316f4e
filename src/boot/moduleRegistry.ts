import type { EventKey, EventMap, LogLevel } from "../types/events";
import type { SystemModule, TypedEventBus } from "../types/module";

type EventHandler<K extends EventKey> = (payload: EventMap[K]) => void;

// Handlers run on a microtask so an emitter never re-enters its own state through a listener.
export class ModuleRegistry implements TypedEventBus {
  private readonly modules = new Map<string, SystemModule>();
  private readonly handlers: { [K in EventKey]?: Set<EventHandler<K>> } = {};

  register(name: string, module: SystemModule): void {
    if (this.modules.has(name)) {
      throw new Error(`Module '${name}' is already registered`);
    }
    this.modules.set(name, module);
  }

  names(): string[] {
    return [...this.modules.keys()];
  }

  on<K extends EventKey>(event: K, handler: EventHandler<K>): () => void {
    const current = this.handlers[event] as Set<EventHandler<K>> | undefined;
    const set = current ?? new Set<EventHandler<K>>();
    set.add(handler);
    this.handlers[event] = set as { [P in EventKey]?: Set<EventHandler<P>> }[K];
    return () => this.off(event, handler);
  }

  off<K extends EventKey>(event: K, handler: EventHandler<K>): void {
    const set = this.handlers[event] as Set<EventHandler<K>> | undefined;
    set?.delete(handler);
  }

  emit<K extends EventKey>(event: K, payload: EventMap[K]): void {
    const set = this.handlers[event] as Set<EventHandler<K>> | undefined;
    if (!set || set.size === 0) return;
    for (const handler of set) {
      queueMicrotask(() => {
        try {
          handler(payload);
        } catch (error) {
          const msg = error instanceof Error ? error.message : String(error);
          if (event === "log") {
            console.error(`Log sink failed: ${msg}`);
            return;
          }
          this.log("ERROR", `Listener for '${event}' failed: ${msg}`);
        }
      });
    }
  }

  log(level: LogLevel, message: string): void {
    this.emit("log", { level, message, ts: Date.now() });
  }

  async startAll(): Promise<void> {
    for (const module of this.modules.values()) {
      await module.start();
    }
  }

  // Reverse registration order: producers stop before the sinks that record them.
  async stopAll(): Promise<void> {
    const modules = [...this.modules.values()].reverse();
    for (const module of modules) {
      await module.stop();
    }
    this.modules.clear();
  }
}
