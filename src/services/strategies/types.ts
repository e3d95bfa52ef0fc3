import type { Dispatcher } from "undici";
import type { StrategyKind } from "../../types/research";

export interface StrategyCapabilities {
  rendersContent: boolean;
  rotatesIdentity: boolean;
}

export interface StrategyRequest {
  url: string;
  headers: Record<string, string>;
  signal: AbortSignal;
  timeoutMs: number;
  maxBodyBytes: number;
  /** Set by the executor for strategies that rotate network identity. */
  proxyUrl?: string;
}

export interface StrategyResponse {
  status: number;
  finalUrl: string;
  contentType: string;
  headers: Record<string, string>;
  body: string;
}

export interface StrategyDescriptor {
  kind: StrategyKind;
  name: string;
  cost: number;
  capabilities: StrategyCapabilities;
}

export type DispatcherFactory = (proxyUrl: string) => Dispatcher;
