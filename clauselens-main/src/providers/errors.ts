import { ProviderError } from "../core/errors.js";

export interface SdkErrorClasses {
  userAbort: abstract new (...args: never[]) => Error;
  connectionTimeout: abstract new (...args: never[]) => Error;
  connection: abstract new (...args: never[]) => Error;
  api: abstract new (...args: never[]) => Error;
}

/** Maps an SDK failure onto the provider error taxonomy. Order matters: timeouts are connection errors too. */
export function toProviderError(providerName: string, err: unknown, classes: SdkErrorClasses): ProviderError {
  if (err instanceof ProviderError) return err;
  if (err instanceof classes.userAbort) {
    return new ProviderError(`${providerName} request aborted.`, "ABORTED", { cause: err });
  }
  if (err instanceof classes.connectionTimeout) {
    return new ProviderError(`${providerName} request timed out.`, "TIMEOUT", { cause: err });
  }
  if (err instanceof classes.connection) {
    return new ProviderError(`${providerName} is unreachable: ${err.message}`, "UNAVAILABLE", { cause: err });
  }
  if (err instanceof classes.api) {
    return new ProviderError(`${providerName} API error: ${err.message}`, "UNAVAILABLE", { cause: err });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new ProviderError(`${providerName} failed: ${message}`, "UNAVAILABLE", { cause: err });
}
