export * from "./catalog";
export * from "./enrich";
export * from "./itemExtractor";
export * from "./primaryDocument";
