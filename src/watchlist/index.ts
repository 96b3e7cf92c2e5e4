export * from "./loadWatchlist";
