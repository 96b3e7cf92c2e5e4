export * from "./dailyIndex";
export * from "./dateProbe";
export * from "./documents";
