import type { ProviderFactory } from "../core/index.js";

const providerFactories: Record<string, ProviderFactory> = {
  openai: () => import("../providers/openai/index.js"),
  anthropic: () => import("../providers/anthropic/index.js"),
};

export function listProviderNames(): string[] {
  return Object.keys(providerFactories);
}

export function resolveProviderFactory(name: string): ProviderFactory {
  const factory = providerFactories[name];
  if (!factory) {
    throw new Error(
      `Unknown LLM provider "${name}". Expected one of: ${listProviderNames().join(", ")}.`,
    );
  }
  return factory;
}
