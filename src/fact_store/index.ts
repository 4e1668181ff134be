// src/fact_store/index.ts

export * from "./types";
export { LocalFactStore, readProfileDocument, DEFAULT_HISTORY_LIMIT } from "./store";
export type { LocalFactStoreOptions } from "./store";
export { loadIdentity, DEFAULT_IDENTITY } from "./identity";
