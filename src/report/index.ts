export * from "./escape";
export * from "./renderReport";
export * from "./writeReport";
