export type ProviderType = "google" | "openai" | "anthropic"
