export * from "./providers"
export * from "./usage"
