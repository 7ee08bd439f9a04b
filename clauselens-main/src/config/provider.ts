import type { ProviderFactory } from "../core/index.js";

export type ProviderName = "openai" | "anthropic";

export const PROVIDER_NAMES: readonly ProviderName[] = ["openai", "anthropic"];

const factories: Readonly<Record<ProviderName, ProviderFactory>> = {
  openai: () => import("../providers/openai/index.js"),
  anthropic: () => import("../providers/anthropic/index.js"),
};

export function selectProviderFactory(name: ProviderName): ProviderFactory {
  return factories[name];
}
