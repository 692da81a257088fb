export { fetchFeed, toEntry, htmlToPlainText } from "./fetcher.js";
export type { FetchFeedOptions } from "./fetcher.js";
