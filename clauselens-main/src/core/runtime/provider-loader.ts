import type { CompletionProvider } from "../contracts/provider.js";

export type ProviderFactory = () => Promise<{ default: CompletionProvider }>;

export async function loadProvider(factory: ProviderFactory): Promise<CompletionProvider> {
  const loaded = await factory();
  const candidate: unknown = loaded?.default;
  if (!isCompletionProvider(candidate)) {
    throw new Error("Invalid provider module: expected a default export implementing complete() and completeStream().");
  }
  return candidate;
}

function isCompletionProvider(value: unknown): value is CompletionProvider {
  if (typeof value !== "object" || value === null) return false;
  return (
    "name" in value &&
    typeof value.name === "string" &&
    "complete" in value &&
    typeof value.complete === "function" &&
    "completeStream" in value &&
    typeof value.completeStream === "function"
  );
}
