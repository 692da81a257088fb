export { SeenStore } from "./seen-store.js";
export type { SeenStoreOptions, SeenStoreLoadResult } from "./seen-store.js";
