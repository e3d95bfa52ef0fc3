import type { StrategyKind } from "../../types/research";
import { PlainFetchStrategy } from "./plainFetch";
import { ProxyRotatedFetchStrategy } from "./proxyRotatedFetch";
import { RenderedFetchStrategy } from "./renderedFetch";
import type { StrategyDescriptor } from "./types";

export { PlainFetchStrategy } from "./plainFetch";
export { ProxyRotatedFetchStrategy } from "./proxyRotatedFetch";
export { RenderedFetchStrategy } from "./renderedFetch";
export type { StrategyCapabilities, StrategyDescriptor, StrategyRequest, StrategyResponse } from "./types";

export type FetchStrategy = PlainFetchStrategy | RenderedFetchStrategy | ProxyRotatedFetchStrategy;

export interface RegistryEntry {
  index: number;
  strategy: FetchStrategy;
}

export function describeStrategy(strategy: FetchStrategy): StrategyDescriptor {
  return {
    kind: strategy.kind,
    name: strategy.name,
    cost: strategy.cost,
    capabilities: { ...strategy.capabilities },
  };
}

/**
 * Immutable, cost-ordered catalog of fetch strategies. Escalation only ever
 * moves to a higher index.
 */
export class StrategyRegistry {
  private readonly ordered: readonly FetchStrategy[];

  constructor(strategies: FetchStrategy[]) {
    if (!strategies.length) {
      throw new Error("Strategy registry needs at least one strategy");
    }
    const kinds = new Set<StrategyKind>();
    for (const strategy of strategies) {
      if (kinds.has(strategy.kind)) {
        throw new Error(`Duplicate strategy kind ${strategy.kind}`);
      }
      kinds.add(strategy.kind);
    }
    this.ordered = Object.freeze([...strategies].sort((a, b) => a.cost - b.cost));
  }

  strategies(): readonly FetchStrategy[] {
    return this.ordered;
  }

  at(index: number): FetchStrategy {
    const strategy = this.ordered[index];
    if (!strategy) {
      throw new RangeError(`No strategy at index ${index}`);
    }
    return strategy;
  }

  next(currentIndex: number): RegistryEntry | null {
    const index = currentIndex + 1;
    const strategy = this.ordered[index];
    return strategy ? { index, strategy } : null;
  }

  indexOf(kind: StrategyKind): number {
    return this.ordered.findIndex((strategy) => strategy.kind === kind);
  }

  describe(): StrategyDescriptor[] {
    return this.ordered.map(describeStrategy);
  }

  /** Releases connection pools held by strategies. */
  async close() {
    await Promise.all(this.ordered.map((strategy) => ("close" in strategy ? strategy.close() : undefined)));
  }
}

export interface RegistryOptions {
  renderer?: { url?: string; apiKey?: string };
  proxies: string[];
}

export function buildStrategyRegistry(options: RegistryOptions): StrategyRegistry {
  const strategies: FetchStrategy[] = [new PlainFetchStrategy()];
  if (options.renderer?.url) {
    strategies.push(new RenderedFetchStrategy({ endpoint: options.renderer.url, apiKey: options.renderer.apiKey }));
  }
  if (options.proxies.length) {
    strategies.push(new ProxyRotatedFetchStrategy());
  }
  return new StrategyRegistry(strategies);
}
