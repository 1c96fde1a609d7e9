export type ProviderPreference = {
  id: string;
  name: string;
  url: string;
  apiKey?: string;
  enabled: boolean;
  /** (model name, enabled) pairs as toggled in settings. */
  models: Array<[string, boolean]>;
  wasCustomlyAdded: boolean;
};

export type SupportedProvider = {
  id: string;
  name: string;
  displayName?: string;
  url: string;
};

export type Bot = {
  /** `<name-length>;<model-name>@<provider-token>` */
  id: string;
  name: string;
  providerId: string;
  avatar?: string;
};

export type ConnectionStatus =
  | { state: "not_connected" }
  | { state: "connecting" }
  | { state: "connected"; modelCount: number }
  | { state: "error"; message: string };

export function hasApiKey(provider: Pick<ProviderPreference, "apiKey">): boolean {
  return (provider.apiKey ?? "").length > 0;
}
