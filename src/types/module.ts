import type { EventKey, EventMap, LogLevel } from "./events";

export interface TypedEventBus {
  emit<K extends EventKey>(event: K, payload: EventMap[K]): void;
  on<K extends EventKey>(event: K, handler: (payload: EventMap[K]) => void): () => void;
  off<K extends EventKey>(event: K, handler: (payload: EventMap[K]) => void): void;
  log(level: LogLevel, message: string): void;
}

export interface SystemModule {
  start(): Promise<void> | void;
  stop(): Promise<void> | void;
}
